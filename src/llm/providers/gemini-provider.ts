import { Content, FinishReason as GeminiFinishReason, GoogleGenerativeAI } from '@google/generative-ai';
import { FinishReason, LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderConfig } from '../types';
import { splitPrompt } from './prompt-parts';
import { logger } from '../../observability/logger';

function finishReason(reason: GeminiFinishReason | undefined): FinishReason {
  if (reason === GeminiFinishReason.STOP) return 'stop';
  if (reason === GeminiFinishReason.MAX_TOKENS) return 'length';
  return 'other';
}

/**
 * Generative Language API adapter. The system prompt becomes the
 * `systemInstruction`, assistant turns use the `model` role, and JSON mode
 * is the native `application/json` response type.
 */
export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  readonly model: string;
  private readonly genAI: GoogleGenerativeAI;
  private readonly timeoutMs: number;
  private readonly log = logger.child({ component: 'gemini-provider' });

  constructor(config: LLMProviderConfig) {
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.genAI = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const modelName = request.model ?? this.model;
    const { system, turns } = splitPrompt(request.messages);

    const contents: Content[] = turns.map((turn) => ({
      role: turn.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: turn.content }],
    }));

    const model = this.genAI.getGenerativeModel(
      {
        model: modelName,
        systemInstruction: system || undefined,
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          ...(request.jsonMode ? { responseMimeType: 'application/json' } : {}),
        },
      },
      { timeout: this.timeoutMs },
    );

    const { response } = await model.generateContent({ contents }, { signal: request.signal });
    const content = response.text();
    const reason = response.candidates?.[0]?.finishReason;
    if (!content) {
      throw new Error(`Gemini returned no text (finishReason: ${reason ?? 'none'})`);
    }

    return {
      content,
      finishReason: finishReason(reason),
      model: modelName,
      provider: this.name,
      usage: {
        promptTokens: response.usageMetadata?.promptTokenCount ?? 0,
        completionTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: response.usageMetadata?.totalTokenCount ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model }, { timeout: this.timeoutMs });
      const { totalTokens } = await model.countTokens('ping');
      return totalTokens > 0;
    } catch (err) {
      this.log.warn({ err, model: this.model }, 'Gemini health check failed');
      return false;
    }
  }
}
