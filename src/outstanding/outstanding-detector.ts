import Ajv from 'ajv';
import { OutstandingRule, matchRule } from './rules';
import { CONFIDENCE_LEVELS, Confidence, OutstandingResult } from '../config/types';
import { KnowledgeLookup } from '../knowledge/types';
import { InferenceService } from '../llm/inference-service';
import { CostLedger } from '../llm/cost-ledger';
import { logger } from '../observability/logger';
import { outstandingDetections } from '../observability/metrics';

export const OUTSTANDING_PARTITION = 'outstanding-cases';

export const DETECTION_ERROR: Readonly<OutstandingResult> = Object.freeze({
  isOutstanding: false,
  trigger: 'detection_error',
  confidence: 'low',
});

interface RawVerdict {
  is_outstanding: boolean;
  trigger: string;
  confidence: Confidence;
}

const validateVerdict = new Ajv({ allErrors: true }).compile<RawVerdict>({
  type: 'object',
  properties: {
    is_outstanding: { type: 'boolean' },
    trigger: { type: 'string' },
    confidence: { type: 'string', enum: [...CONFIDENCE_LEVELS] },
  },
  required: ['is_outstanding', 'trigger', 'confidence'],
});

const SYSTEM_PROMPT = [
  'You screen one customer message to a subscription box service for outstanding risk:',
  'health or allergy problems, being charged after cancelling, repeated service failures,',
  'threats of public complaints, account compromise, or a customer in a vulnerable situation.',
  'Ordinary questions and complaints are not outstanding.',
  '',
  'Respond with JSON only:',
  '{"is_outstanding": false, "trigger": "none", "confidence": "high"}',
  'trigger is a short snake_case label for the risk, or "none".',
].join('\n');

export interface OutstandingDetectorOptions {
  /** Minimum similarity score for a match against confirmed cases */
  similarityThreshold: number;
  llmEnabled: boolean;
  timeoutMs: number;
  model?: string;
}

/**
 * Narrow risk screen run beside generation. Rules first, then similarity
 * to confirmed cases, then a cheap model check. It only reports; the
 * evaluation gate decides what the signal means.
 */
export class OutstandingDetector {
  private readonly log = logger.child({ component: 'outstanding-detector' });

  constructor(
    private readonly rules: readonly OutstandingRule[],
    private readonly knowledge: KnowledgeLookup,
    private readonly inference: InferenceService,
    private readonly options: OutstandingDetectorOptions,
  ) {}

  async detect(
    identifier: string | undefined,
    text: string,
    opts: { signal?: AbortSignal; ledger?: CostLedger } = {},
  ): Promise<OutstandingResult> {
    try {
      const rule = matchRule(this.rules, text);
      if (rule) {
        return this.verdict({ isOutstanding: true, trigger: rule.trigger, confidence: 'high' }, 'rule');
      }

      const [closest] = await this.knowledge.search(OUTSTANDING_PARTITION, text, 1);
      if (closest && closest.score >= this.options.similarityThreshold) {
        const trigger = closest.tags[0] ?? closest.id;
        return this.verdict({ isOutstanding: true, trigger, confidence: 'medium' }, 'similarity');
      }

      if (!this.options.llmEnabled) {
        return this.verdict({ isOutstanding: false, trigger: 'none', confidence: 'medium' }, 'none');
      }

      const result = await this.inference.infer({
        purpose: 'outstanding',
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `Customer identified: ${identifier ? 'yes' : 'no'}\nMessage:\n${text}` },
        ],
        validate: validateVerdict,
        timeoutMs: this.options.timeoutMs,
        model: this.options.model || undefined,
        temperature: 0,
        maxTokens: 100,
        signal: opts.signal,
      });
      opts.ledger?.record('outstanding', result.meta);

      if (!result.ok) {
        this.log.warn({ kind: result.error.kind }, 'Outstanding check failed');
        return this.verdict({ ...DETECTION_ERROR }, 'error');
      }

      const { is_outstanding, trigger, confidence } = result.data;
      return this.verdict(
        { isOutstanding: is_outstanding, trigger: is_outstanding ? normalizeTrigger(trigger) : 'none', confidence },
        'model',
      );
    } catch (err) {
      this.log.warn({ err }, 'Outstanding detection error');
      return this.verdict({ ...DETECTION_ERROR }, 'error');
    }
  }

  private verdict(result: OutstandingResult, source: string): OutstandingResult {
    outstandingDetections.inc({ outstanding: String(result.isOutstanding), source });
    if (result.isOutstanding) {
      this.log.info({ trigger: result.trigger, confidence: result.confidence, source }, 'Outstanding signal detected');
    }
    return result;
  }
}

function normalizeTrigger(trigger: string): string {
  const label = trigger
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return label || 'unspecified';
}
