import { ValidateFunction } from 'ajv';
import { CompletionBackend, LLMMessage, LLMProviderName, LLMTokenUsage } from './types';
import { AbortedError, TimeoutError, withTimeout } from '../resilience/timeout';
import { logger } from '../observability/logger';
import { inferenceCostUsd, inferenceRequests } from '../observability/metrics';

export type InferencePurpose = 'classify' | 'generate' | 'judge' | 'outstanding';

export interface InferenceRequest<T> {
  purpose: InferencePurpose;
  messages: LLMMessage[];
  /** Compiled ajv validator for the structured reply */
  validate: ValidateFunction<T>;
  timeoutMs: number;
  model?: string;
  provider?: LLMProviderName;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface InferenceMeta {
  provider?: LLMProviderName;
  model?: string;
  latencyMs: number;
  usage?: LLMTokenUsage;
  costUsd: number;
}

export type InferenceErrorKind = 'timeout' | 'aborted' | 'malformed' | 'service';

export type InferenceResult<T> =
  | { ok: true; data: T; meta: InferenceMeta }
  | { ok: false; error: { kind: InferenceErrorKind; message: string }; meta: InferenceMeta };

/** Structured inference with a per-call timeout and cost/latency metadata */
export interface InferenceService {
  infer<T>(prompt: InferenceRequest<T>): Promise<InferenceResult<T>>;
}

/** USD per 1K tokens (prompt, completion). Unlisted models are costed at zero. */
const MODEL_PRICING: Record<string, { prompt: number; completion: number }> = {
  'gpt-4.1': { prompt: 0.002, completion: 0.008 },
  'gpt-4.1-mini': { prompt: 0.0004, completion: 0.0016 },
  'gpt-4o-mini': { prompt: 0.00015, completion: 0.0006 },
  'claude-3-5-haiku-latest': { prompt: 0.0008, completion: 0.004 },
  'claude-sonnet-4-20250514': { prompt: 0.003, completion: 0.015 },
  'gemini-2.0-flash': { prompt: 0.0001, completion: 0.0004 },
};

export function estimateCostUsd(model: string, usage: LLMTokenUsage): number {
  // longest matching prefix, so gpt-4.1-mini is not priced as gpt-4.1
  const match = Object.keys(MODEL_PRICING)
    .filter((name) => model.startsWith(name))
    .sort((a, b) => b.length - a.length)[0];
  const price = match ? MODEL_PRICING[match] : undefined;
  if (!price) return 0;
  return (usage.promptTokens / 1000) * price.prompt + (usage.completionTokens / 1000) * price.completion;
}

/**
 * Parse model output as JSON, tolerating markdown code fences.
 */
export function parseModelJson(raw: string): unknown {
  let jsonStr = raw.trim();
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
  }
  return JSON.parse(jsonStr);
}

/**
 * Inference over the model router. Every failure comes back as a value;
 * nothing thrown by a provider escapes `infer`.
 */
export class RoutedInferenceService implements InferenceService {
  private readonly log = logger.child({ component: 'inference' });

  constructor(
    private readonly backend: CompletionBackend,
    private readonly defaults: { temperature: number; maxTokens: number },
  ) {}

  async infer<T>(prompt: InferenceRequest<T>): Promise<InferenceResult<T>> {
    const start = Date.now();
    let meta: InferenceMeta = { latencyMs: 0, costUsd: 0 };

    try {
      const response = await withTimeout(
        `inference:${prompt.purpose}`,
        prompt.timeoutMs,
        (signal) =>
          this.backend.complete(
            {
              messages: prompt.messages,
              temperature: prompt.temperature ?? this.defaults.temperature,
              maxTokens: prompt.maxTokens ?? this.defaults.maxTokens,
              jsonMode: true,
              model: prompt.model,
              signal,
            },
            prompt.provider,
          ),
        prompt.signal,
      );

      const costUsd = estimateCostUsd(response.model, response.usage);
      meta = {
        provider: response.provider,
        model: response.model,
        latencyMs: Date.now() - start,
        usage: response.usage,
        costUsd,
      };
      inferenceCostUsd.inc({ purpose: prompt.purpose, model: response.model }, costUsd);

      if (response.finishReason === 'length') {
        return this.fail(prompt, meta, 'malformed', `Output truncated at ${prompt.maxTokens ?? this.defaults.maxTokens} tokens`);
      }

      let parsed: unknown;
      try {
        parsed = parseModelJson(response.content);
      } catch (err) {
        return this.fail(prompt, meta, 'malformed', `Unparsable JSON: ${errorMessage(err)}`);
      }

      if (!prompt.validate(parsed)) {
        const errors = prompt.validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
        return this.fail(prompt, meta, 'malformed', `Schema mismatch: ${errors ?? 'unknown'}`);
      }

      inferenceRequests.inc({ purpose: prompt.purpose, status: 'success' });
      return { ok: true, data: parsed, meta };
    } catch (err) {
      meta = { ...meta, latencyMs: Date.now() - start };
      if (err instanceof TimeoutError) return this.fail(prompt, meta, 'timeout', err.message);
      if (err instanceof AbortedError) return this.fail(prompt, meta, 'aborted', err.message);
      return this.fail(prompt, meta, 'service', errorMessage(err));
    }
  }

  private fail<T>(
    prompt: InferenceRequest<T>,
    meta: InferenceMeta,
    kind: InferenceErrorKind,
    message: string,
  ): InferenceResult<T> {
    inferenceRequests.inc({ purpose: prompt.purpose, status: kind });
    this.log.warn({ purpose: prompt.purpose, kind, message, latencyMs: meta.latencyMs }, 'Inference call failed');
    return { ok: false, error: { kind, message }, meta };
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
