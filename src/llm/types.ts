// ─── Messages ─────────────────────────────────────────────────────
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai' | 'anthropic' | 'gemini';
export const LLM_PROVIDER_NAMES: readonly LLMProviderName[] = ['openai', 'anthropic', 'gemini'];

export function isProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDER_NAMES.some((name) => name === value);
}

// ─── Provider Configuration ───────────────────────────────────────
export interface LLMProviderConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
  /** Hint providers to produce JSON output */
  jsonMode: boolean;
  /** Overrides the provider's configured model for this call */
  model?: string;
  /** Aborts the in-flight request (per-call timeout) */
  signal?: AbortSignal;
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Why generation stopped; `length` means the output hit the token limit */
export type FinishReason = 'stop' | 'length' | 'other';

export interface LLMCompletionResponse {
  /** Raw text from the model (must be JSON-parseable when jsonMode was true) */
  content: string;
  finishReason: FinishReason;
  /** Actual model identifier returned by the provider */
  model: string;
  /** Which provider served the request */
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send a completion request and return the response.
   * Implementations must map our generic message format to provider-specific APIs.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /** Lightweight connectivity check */
  healthCheck(): Promise<boolean>;
}

// ─── Model Router Configuration ───────────────────────────────────
export interface ModelRouterConfig {
  primaryProvider: LLMProviderName;
  secondaryProvider?: LLMProviderName;
  tertiaryProvider?: LLMProviderName;
}

/** Anything that can serve a completion with failover (the router, or a test double) */
export interface CompletionBackend {
  complete(request: LLMCompletionRequest, preferred?: LLMProviderName): Promise<LLMCompletionResponse>;
  healthCheck(): Promise<Record<string, { status: string; latencyMs: number }>>;
}
