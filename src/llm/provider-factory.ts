import { LLMProvider, LLMProviderName, LLMProviderConfig, ModelRouterConfig, isProviderName } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

type ProviderEnv = Record<LLMProviderName, LLMProviderConfig>;

export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build all configured providers from environment configuration.
 * Only creates providers whose API keys are set.
 */
export function buildProviders(envConfig: ProviderEnv): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of ['openai', 'anthropic', 'gemini'] as const) {
    const config = envConfig[name];
    if (config.apiKey) {
      providers.set(name, createProvider(name, config));
      log.info({ provider: name, model: config.model }, 'LLM provider initialized');
    }
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY',
    );
  }

  return providers;
}

/**
 * Turn the string settings from env into a router configuration.
 * Unknown names are dropped; an unusable primary falls back to the first built provider.
 */
export function resolveRouterConfig(
  settings: { primaryProvider: string; secondaryProvider: string; tertiaryProvider: string },
  available: Map<LLMProviderName, LLMProvider>,
): ModelRouterConfig {
  const pick = (value: string): LLMProviderName | undefined =>
    isProviderName(value) && available.has(value) ? value : undefined;

  const [firstAvailable] = available.keys();
  const primary = pick(settings.primaryProvider) ?? firstAvailable;
  if (!primary) {
    throw new Error('Cannot build model router without providers');
  }

  return {
    primaryProvider: primary,
    secondaryProvider: pick(settings.secondaryProvider),
    tertiaryProvider: pick(settings.tertiaryProvider),
  };
}
