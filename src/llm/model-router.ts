import {
  CompletionBackend,
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
  ModelRouterConfig,
} from './types';
import { logger } from '../observability/logger';
import { llmRequestDuration, llmProviderFailovers, llmTokenUsage } from '../observability/metrics';

export interface BreakerSettings {
  /** Consecutive failures that open the breaker */
  threshold: number;
  /** How long an open breaker skips the provider */
  resetMs: number;
}

const DEFAULT_BREAKER: BreakerSettings = { threshold: 5, resetMs: 60_000 };

/**
 * Consecutive-failure breaker for one provider. Once the reset window has
 * passed a single trial call goes through; a failed trial reopens at once.
 */
export class ProviderBreaker {
  private failures = 0;
  private openUntil = 0;

  constructor(private readonly settings: BreakerSettings) {}

  isOpen(now: number): boolean {
    return now < this.openUntil;
  }

  /** Returns true when this failure opened the breaker */
  recordFailure(now: number): boolean {
    this.failures++;
    const halfOpen = this.openUntil > 0 && now >= this.openUntil;
    if (this.failures >= this.settings.threshold || halfOpen) {
      this.openUntil = now + this.settings.resetMs;
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.failures = 0;
    this.openUntil = 0;
  }
}

/**
 * Picks the provider for each inference call.
 *
 * A call may name a preferred provider (category configuration does this);
 * the configured priority chain follows it as failover. A caller-side abort is
 * not a provider failure: it is rethrown immediately and does not count
 * towards the breaker.
 */
export class ModelRouter implements CompletionBackend {
  private readonly breakers = new Map<LLMProviderName, ProviderBreaker>();
  private readonly log = logger.child({ component: 'model-router' });

  constructor(
    private readonly config: ModelRouterConfig,
    private readonly providers: Map<LLMProviderName, LLMProvider>,
    private readonly breakerSettings: BreakerSettings = DEFAULT_BREAKER,
    private readonly now: () => number = Date.now,
  ) {
    if (!providers.has(config.primaryProvider)) {
      throw new Error(
        `Primary provider "${config.primaryProvider}" not available. ` +
        `Configured providers: ${Array.from(providers.keys()).join(', ')}`,
      );
    }

    this.log.info({
      primary: config.primaryProvider,
      secondary: config.secondaryProvider,
      tertiary: config.tertiaryProvider,
      availableProviders: Array.from(providers.keys()),
    }, 'Model router initialized');
  }

  async complete(request: LLMCompletionRequest, preferred?: LLMProviderName): Promise<LLMCompletionResponse> {
    let lastError: Error | undefined;
    let previous: LLMProviderName | undefined;

    for (const name of this.providerOrder(preferred)) {
      const provider = this.providers.get(name);
      if (!provider) continue;

      const breaker = this.breaker(name);
      if (breaker.isOpen(this.now())) {
        this.log.debug({ provider: name }, 'Breaker open, skipping provider');
        continue;
      }

      // A model override only applies to the provider it was written for
      const routed: LLMCompletionRequest = preferred && name !== preferred ? { ...request, model: undefined } : request;
      const timer = llmRequestDuration.startTimer({ provider: name, model: routed.model ?? provider.model });

      try {
        const response = await provider.complete(routed);
        breaker.recordSuccess();
        timer({ status: 'success' });
        llmTokenUsage.inc({ provider: name, model: response.model, token_type: 'prompt' }, response.usage.promptTokens);
        llmTokenUsage.inc({ provider: name, model: response.model, token_type: 'completion' }, response.usage.completionTokens);

        if (previous) {
          llmProviderFailovers.inc({ from_provider: previous, to_provider: name, reason: 'error' });
          this.log.info({ from: previous, to: name }, 'Failover succeeded');
        }
        return response;
      } catch (err) {
        timer({ status: 'error' });
        lastError = err instanceof Error ? err : new Error(String(err));
        if (request.signal?.aborted) {
          throw lastError;
        }

        if (breaker.recordFailure(this.now())) {
          this.log.error({ provider: name, resetMs: this.breakerSettings.resetMs }, 'Breaker opened for provider');
        }
        previous = name;
        this.log.warn({ provider: name, err: lastError.message }, 'Provider failed, trying next');
      }
    }

    throw new Error(`All LLM providers failed. Last error: ${lastError?.message ?? 'no provider available'}`);
  }

  async healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>> {
    const entries = await Promise.all(
      Array.from(this.providers, async ([name, provider]) => {
        const start = Date.now();
        let healthy = false;
        try {
          healthy = await provider.healthCheck();
        } catch (err) {
          this.log.warn({ err, provider: name }, 'Provider health check threw');
        }
        return [name, { status: healthy ? 'ok' : 'error', latencyMs: Date.now() - start }] as const;
      }),
    );
    return Object.fromEntries(entries);
  }

  private providerOrder(preferred?: LLMProviderName): LLMProviderName[] {
    const chain = [preferred, this.config.primaryProvider, this.config.secondaryProvider, this.config.tertiaryProvider];
    const order: LLMProviderName[] = [];
    for (const name of chain) {
      if (name && this.providers.has(name) && !order.includes(name)) order.push(name);
    }
    return order;
  }

  private breaker(name: LLMProviderName): ProviderBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new ProviderBreaker(this.breakerSettings);
      this.breakers.set(name, breaker);
    }
    return breaker;
  }
}
