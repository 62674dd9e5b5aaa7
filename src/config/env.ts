import dotenv from 'dotenv';
import path from 'path';
import { Confidence, CONFIDENCE_LEVELS } from './types';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalConfidence(key: string, fallback: Confidence): Confidence {
  const val = process.env[key];
  return CONFIDENCE_LEVELS.find((level) => level === val) ?? fallback;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4.1-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.2),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 1024),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.2),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-2.0-flash'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 1024),
    temperature: optionalFloat('GEMINI_TEMPERATURE', 0.2),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'openai'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
    classifierModel: optional('CLASSIFIER_MODEL', ''),
    judgeModel: optional('JUDGE_MODEL', ''),
    outstandingModel: optional('OUTSTANDING_MODEL', ''),
  },

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'ste:'),
    enabled: optionalBool('REDIS_ENABLED', true),
  },

  // ───── Per-stage timeouts ─────
  timeouts: {
    classifierMs: optionalInt('CLASSIFIER_TIMEOUT_MS', 8000),
    generatorMs: optionalInt('GENERATOR_TIMEOUT_MS', 30000),
    outstandingMs: optionalInt('OUTSTANDING_TIMEOUT_MS', 8000),
    judgeMs: optionalInt('JUDGE_TIMEOUT_MS', 15000),
    lookupMs: optionalInt('LOOKUP_TIMEOUT_MS', 5000),
    toolMs: optionalInt('TOOL_TIMEOUT_MS', 15000),
    /** Upper bound on the generator/detector join */
    joinMs: optionalInt('JOIN_TIMEOUT_MS', 35000),
  },

  // ───── Turn limits ─────
  turn: {
    maxMessageChars: optionalInt('MAX_MESSAGE_CHARS', 8000),
  },

  context: {
    verbatimTurns: optionalInt('CONTEXT_VERBATIM_TURNS', 5),
    summaryWindow: optionalInt('CONTEXT_SUMMARY_WINDOW', 15),
    maxAccountFacts: optionalInt('CONTEXT_MAX_ACCOUNT_FACTS', 6),
    maxReplyChars: optionalInt('CONTEXT_MAX_REPLY_CHARS', 500),
    charBudget: optionalInt('CONTEXT_CHAR_BUDGET', 12000),
  },

  // ───── Evaluation Gate ─────
  evaluation: {
    scoreThreshold: optionalFloat('EVAL_SCORE_THRESHOLD', 0.7),
    safetyThreshold: optionalFloat('EVAL_SAFETY_THRESHOLD', 0.9),
    outstandingMinConfidence: optionalConfidence('OUTSTANDING_MIN_CONFIDENCE', 'medium'),
    autoSendPhase: optionalInt('AUTO_SEND_PHASE', 2),
  },

  outstanding: {
    similarityThreshold: optionalFloat('OUTSTANDING_SIMILARITY_THRESHOLD', 0.6),
    llmEnabled: optionalBool('OUTSTANDING_LLM_ENABLED', true),
  },

  // ───── Tool governance ─────
  governance: {
    confirmationDeadlineMinutes: optionalInt('CONFIRMATION_DEADLINE_MINUTES', 60),
    sweepIntervalSeconds: optionalInt('CONFIRMATION_SWEEP_INTERVAL_SECONDS', 60),
  },

  // ───── Correction learning ─────
  learning: {
    fewShotEnabled: optionalBool('LEARNING_FEW_SHOT_ENABLED', true),
    fewShotExamples: optionalInt('LEARNING_FEW_SHOT_EXAMPLES', 3),
  },

  // ───── Commerce platform ─────
  platform: {
    useMock: optionalBool('USE_MOCK_PLATFORM', true),
    baseUrl: optional('PLATFORM_BASE_URL', 'http://localhost:4000/api'),
    apiKey: optional('PLATFORM_API_KEY', ''),
    cancelLinkBaseUrl: optional('CANCEL_LINK_BASE_URL', 'https://example.com/cancel'),
    cancelLinkSecret: optional('CANCEL_LINK_SECRET', 'dev-cancel-link-secret'),
    cancelLinkTtlHours: optionalInt('CANCEL_LINK_TTL_HOURS', 72),
  },

  dedup: {
    ttlSeconds: optionalInt('DEDUP_TTL_SECONDS', 300),
    maxEntries: optionalInt('DEDUP_MAX_ENTRIES', 50_000),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
