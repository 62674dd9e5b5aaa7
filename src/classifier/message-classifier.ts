import Ajv from 'ajv';
import {
  CATEGORIES,
  Category,
  Channel,
  ClassificationResult,
  SENTIMENTS,
  Sentiment,
  URGENCY_LEVELS,
  Urgency,
} from '../config/types';
import { InferenceService } from '../llm/inference-service';
import { CostLedger } from '../llm/cost-ledger';
import { logger } from '../observability/logger';
import { classifierFallbacks } from '../observability/metrics';

interface RawClassification {
  primary_category: Category;
  secondary_category?: Category | null;
  urgency: Urgency;
  sentiment: Sentiment;
  identifier?: string | null;
  escalation_signal: boolean;
}

const CLASSIFICATION_SCHEMA = {
  type: 'object',
  properties: {
    primary_category: { type: 'string', enum: [...CATEGORIES] },
    secondary_category: { type: ['string', 'null'], enum: [...CATEGORIES, null] },
    urgency: { type: 'string', enum: [...URGENCY_LEVELS] },
    sentiment: { type: 'string', enum: [...SENTIMENTS] },
    identifier: { type: ['string', 'null'] },
    escalation_signal: { type: 'boolean' },
  },
  required: ['primary_category', 'urgency', 'sentiment', 'escalation_signal'],
};

const validateClassification = new Ajv({ allErrors: true, allowUnionTypes: true }).compile<RawClassification>(CLASSIFICATION_SCHEMA);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const MAX_ATTEMPTS = 2;

export const FALLBACK_CLASSIFICATION: Readonly<ClassificationResult> = Object.freeze({
  primary: 'unknown',
  urgency: 'medium',
  sentiment: 'neutral',
  escalationSignal: false,
  fallback: true,
});

const SYSTEM_PROMPT = [
  'You classify one customer support message for a monthly subscription box service.',
  '',
  'Categories:',
  '- shipping_or_delivery_question: where is my box, tracking, delivery times',
  '- payment_question: charges, failed payments, refunds, billing dates',
  '- frequency_change_request: change how often boxes arrive',
  '- skip_or_pause_request: skip a month or pause the subscription',
  '- recipient_or_address_change: new address or different recipient',
  '- customization_request: preferences, swapping or choosing items',
  '- damaged_or_leaking_item_report: an item arrived broken, damaged or leaking',
  '- gratitude: thanks or praise with no request',
  '- retention_primary_request: first request to cancel the subscription',
  '- retention_repeated_request: asks to cancel again after being offered alternatives',
  '- unknown: none of the above',
  '',
  'Urgency is one of low, medium, high, critical. Sentiment is one of positive, neutral, negative, frustrated.',
  'identifier: the customer email address if the message contains one, otherwise null.',
  'escalation_signal: true only if the customer explicitly asks for a human.',
  '',
  'Respond with JSON only:',
  '{"primary_category": "...", "secondary_category": null, "urgency": "...", "sentiment": "...", "identifier": null, "escalation_signal": false}',
].join('\n');

export interface ClassifyOptions {
  signal?: AbortSignal;
  ledger?: CostLedger;
}

/**
 * Inference-backed message classifier. Never throws: after one retry,
 * any failure yields the unknown-category fallback.
 */
export class MessageClassifier {
  private readonly log = logger.child({ component: 'classifier' });

  constructor(
    private readonly inference: InferenceService,
    private readonly options: { timeoutMs: number; model?: string },
  ) {}

  async classify(text: string, channelHint: Channel, opts: ClassifyOptions = {}): Promise<ClassificationResult> {
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const result = await this.inference.infer({
        purpose: 'classify',
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `Channel: ${channelHint}\nMessage:\n${text}` },
        ],
        validate: validateClassification,
        timeoutMs: this.options.timeoutMs,
        model: this.options.model || undefined,
        temperature: 0,
        maxTokens: 200,
        signal: opts.signal,
      });
      opts.ledger?.record('classify', result.meta);

      if (result.ok) {
        return toClassification(result.data);
      }

      this.log.warn({ attempt, kind: result.error.kind }, 'Classification attempt failed');
      if (result.error.kind === 'aborted') break;
    }

    classifierFallbacks.inc();
    return { ...FALLBACK_CLASSIFICATION };
  }
}

function toClassification(raw: RawClassification): ClassificationResult {
  const identifier = raw.identifier?.trim().toLowerCase();
  const secondary = raw.secondary_category ?? undefined;
  return {
    primary: raw.primary_category,
    secondary: secondary && secondary !== raw.primary_category ? secondary : undefined,
    urgency: raw.urgency,
    sentiment: raw.sentiment,
    identifier: identifier && EMAIL_PATTERN.test(identifier) ? identifier : undefined,
    escalationSignal: raw.escalation_signal,
    fallback: false,
  };
}
