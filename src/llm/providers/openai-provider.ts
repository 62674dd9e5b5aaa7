import OpenAI from 'openai';
import { FinishReason, LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderConfig } from '../types';
import { logger } from '../../observability/logger';

const MAX_RETRIES = 1;

function finishReason(reason: string | null | undefined): FinishReason {
  if (reason === 'stop') return 'stop';
  if (reason === 'length') return 'length';
  return 'other';
}

/**
 * Chat completions adapter. Structured output uses the native JSON object
 * response format; proposed tool calls travel inside that object rather than
 * through native function calling.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly log = logger.child({ component: 'openai-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.client = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: MAX_RETRIES });
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const model = request.model ?? this.model;

    const completion = await this.client.chat.completions.create(
      {
        model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal: request.signal },
    );

    const choice = completion.choices[0];
    const content = choice?.message?.content;
    if (!content) {
      throw new Error(`OpenAI returned no content (finish_reason: ${choice?.finish_reason ?? 'none'})`);
    }

    return {
      content,
      finishReason: finishReason(choice.finish_reason),
      model: completion.model ?? model,
      provider: this.name,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  /** Checks that the configured model is reachable with this key */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'OpenAI health check failed');
      return false;
    }
  }
}
