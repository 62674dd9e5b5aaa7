import Anthropic from '@anthropic-ai/sdk';
import { FinishReason, LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderConfig } from '../types';
import { JSON_ONLY_INSTRUCTION, splitPrompt } from './prompt-parts';
import { logger } from '../../observability/logger';

/** Assistant prefill that commits the model to a JSON object */
const JSON_PREFILL = '{';

function finishReason(reason: string | null): FinishReason {
  if (reason === 'end_turn' || reason === 'stop_sequence') return 'stop';
  if (reason === 'max_tokens') return 'length';
  return 'other';
}

/**
 * Messages API adapter. The system prompt is a separate parameter and turns
 * must alternate starting with the user. In JSON mode the assistant turn is
 * prefilled with `{`, which the reply then continues.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly log = logger.child({ component: 'anthropic-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new Anthropic({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 1 });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const model = request.model ?? this.model;
    const { system, turns } = splitPrompt(request.messages);

    const messages = [...turns];
    if (request.jsonMode) {
      messages.push({ role: 'assistant', content: JSON_PREFILL });
    }

    const response = await this.client.messages.create(
      {
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.jsonMode ? `${system}\n\n${JSON_ONLY_INSTRUCTION}`.trim() : system || undefined,
        messages,
      },
      { signal: request.signal },
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
    if (!text) {
      throw new Error(`Anthropic returned no text (stop_reason: ${response.stop_reason ?? 'none'})`);
    }

    return {
      content: request.jsonMode ? JSON_PREFILL + text : text,
      finishReason: finishReason(response.stop_reason),
      model: response.model ?? model,
      provider: this.name,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      latencyMs: Date.now() - start,
    };
  }

  /** One-token completion against the configured model */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 1,
        messages: [{ role: 'user', content: 'ping' }],
      });
      return response.usage.input_tokens > 0;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'Anthropic health check failed');
      return false;
    }
  }
}
