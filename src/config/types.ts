/** Channel a turn arrived on */
export type Channel = 'chat' | 'email' | 'widget';
export const CHANNELS: readonly Channel[] = ['chat', 'email', 'widget'];

// ───── Classification ─────

export const CATEGORIES = [
  'shipping_or_delivery_question',
  'payment_question',
  'frequency_change_request',
  'skip_or_pause_request',
  'recipient_or_address_change',
  'customization_request',
  'damaged_or_leaking_item_report',
  'gratitude',
  'retention_primary_request',
  'retention_repeated_request',
  'unknown',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const URGENCY_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type Urgency = (typeof URGENCY_LEVELS)[number];

export const SENTIMENTS = ['positive', 'neutral', 'negative', 'frustrated'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

/** Ordinal rank of a confidence level, low = 0 */
export function confidenceRank(level: Confidence): number {
  return CONFIDENCE_LEVELS.indexOf(level);
}

export interface ClassificationResult {
  primary: Category;
  secondary?: Category;
  urgency: Urgency;
  sentiment: Sentiment;
  /** Contact key extracted from the message text (an email address) */
  identifier?: string;
  escalationSignal: boolean;
  /** True when the classifier could not produce a result and defaults were substituted */
  fallback: boolean;
}

// ───── Turn ─────

export interface SessionHint {
  sessionId?: string;
  contactEmail?: string;
  contactName?: string;
}

export interface TurnRequest {
  text: string;
  channel: Channel;
  session?: SessionHint;
  /** Upstream message id used for duplicate suppression */
  messageId?: string;
}

export interface ConversationTurn {
  readonly turnId: string;
  readonly sessionId: string;
  readonly text: string;
  readonly channel: Channel;
  readonly receivedAt: number;
}

// ───── Evaluation ─────

export type Disposition = 'send' | 'draft' | 'escalate';
export type EvalTier = 'fast-fail' | 'judge';

export interface EvalResult {
  disposition: Disposition;
  confidence: Confidence;
  /** Empty when disposition is send, non-empty otherwise */
  reasons: string[];
  tier: EvalTier;
  /** Per-check scores from the judge tier, when it ran */
  scores?: Record<string, number>;
}

// ───── Outstanding detection ─────

export interface OutstandingResult {
  isOutstanding: boolean;
  trigger: string;
  confidence: Confidence;
}
