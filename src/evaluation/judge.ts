import Ajv from 'ajv';
import { Category, CONFIDENCE_LEVELS, Confidence, Disposition, OutstandingResult } from '../config/types';
import { InferenceService } from '../llm/inference-service';
import { CostLedger } from '../llm/cost-ledger';
import { ToolName } from '../tools/types';
import { logger } from '../observability/logger';

export const JUDGE_CHECKS = ['safety', 'tone', 'accuracy', 'completeness'] as const;
export type JudgeCheck = (typeof JUDGE_CHECKS)[number];

export interface JudgeVerdict {
  decision: Disposition;
  confidence: Confidence;
  checks: Record<JudgeCheck, number>;
}

/** A tool output the generator had, so the judge can verify claims against it */
export interface ToolEvidence {
  tool: ToolName;
  state: string;
  success?: boolean;
  data?: unknown;
}

export interface JudgeInput {
  customerText: string;
  reply: string;
  category: Category;
  outstanding: OutstandingResult;
  toolEvidence: ToolEvidence[];
}

export type JudgeResult = { ok: true; verdict: JudgeVerdict } | { ok: false; error: string };

const SCORE = { type: 'number', minimum: 0, maximum: 1 };

const validateVerdict = new Ajv({ allErrors: true }).compile<JudgeVerdict>({
  type: 'object',
  properties: {
    decision: { type: 'string', enum: ['send', 'draft', 'escalate'] },
    confidence: { type: 'string', enum: [...CONFIDENCE_LEVELS] },
    checks: {
      type: 'object',
      properties: Object.fromEntries(JUDGE_CHECKS.map((check) => [check, SCORE])),
      required: [...JUDGE_CHECKS],
    },
  },
  required: ['decision', 'confidence', 'checks'],
});

const SYSTEM_PROMPT = [
  'You are the final quality check before a support reply is sent to a customer of a subscription box service.',
  '',
  'Score the reply from 0.0 to 1.0 on four checks:',
  '- safety: never confirms a cancellation, pause or refund that did not happen; exposes no sensitive data',
  '- tone: warm, professional and empathetic',
  '- accuracy: every fact is supported by the tool outputs or is general policy; nothing invented',
  '- completeness: answers what the customer asked and gives a next step',
  '',
  'Decide "send" when every check is at least 0.7 and safety is at least 0.9,',
  '"draft" when a human should review it first, and "escalate" when the customer needs a human now.',
  'For an outstanding case be stricter: when in doubt, "draft".',
  '',
  'Respond with JSON only:',
  '{"decision": "send", "confidence": "high", "checks": {"safety": 1.0, "tone": 0.9, "accuracy": 0.9, "completeness": 0.8}}',
].join('\n');

function renderInput(input: JudgeInput): string {
  const outstanding = input.outstanding.isOutstanding
    ? `yes (${input.outstanding.trigger}, ${input.outstanding.confidence} confidence)`
    : 'no';
  const evidence =
    input.toolEvidence.length > 0
      ? input.toolEvidence.map((e) => `- ${e.tool} [${e.state}]: ${JSON.stringify(e.data ?? null)}`).join('\n')
      : '(no tool calls)';

  return [
    `CATEGORY: ${input.category}`,
    `OUTSTANDING: ${outstanding}`,
    '',
    'TOOL OUTPUTS:',
    evidence,
    '',
    'CUSTOMER MESSAGE:',
    input.customerText,
    '',
    'REPLY TO EVALUATE:',
    input.reply,
  ].join('\n');
}

/** Inference-backed reply judge (tier 2 of the evaluation gate) */
export class ReplyJudge {
  private readonly log = logger.child({ component: 'judge' });

  constructor(
    private readonly inference: InferenceService,
    private readonly options: { timeoutMs: number; model?: string },
  ) {}

  async judge(input: JudgeInput, opts: { signal?: AbortSignal; ledger?: CostLedger } = {}): Promise<JudgeResult> {
    const result = await this.inference.infer({
      purpose: 'judge',
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: renderInput(input) },
      ],
      validate: validateVerdict,
      timeoutMs: this.options.timeoutMs,
      model: this.options.model || undefined,
      temperature: 0,
      maxTokens: 300,
      signal: opts.signal,
    });
    opts.ledger?.record('judge', result.meta);

    if (!result.ok) {
      return { ok: false, error: result.error.kind };
    }
    this.log.debug({ decision: result.data.decision, confidence: result.data.confidence }, 'Judge verdict');
    return { ok: true, verdict: result.data };
  }
}
