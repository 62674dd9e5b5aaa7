import { fastFailCheck } from './fast-fail';
import { JUDGE_CHECKS, JudgeInput, JudgeVerdict, ReplyJudge } from './judge';
import { Confidence, confidenceRank, EvalResult } from '../config/types';
import { CategoryConfigTable } from '../config/category-config';
import { CostLedger } from '../llm/cost-ledger';
import { logger } from '../observability/logger';

export interface GatePolicy {
  scoreThreshold: number;
  safetyThreshold: number;
  outstandingMinConfidence: Confidence;
  /** Deployment rollout phase; categories configured for a later phase never auto-send */
  autoSendPhase: number;
}

export interface GateInput extends JudgeInput {
  /** Generator or detector missing from the join */
  degraded: boolean;
}

/**
 * Two-tier disposition gate. Tier 1 patterns are terminal; the judge is only
 * consulted when they pass. Without a judge verdict nothing is sent.
 */
export class EvaluationGate {
  private readonly log = logger.child({ component: 'evaluation-gate' });

  constructor(
    private readonly judge: ReplyJudge,
    private readonly categories: CategoryConfigTable,
    private readonly policy: GatePolicy,
  ) {}

  async evaluate(input: GateInput, opts: { ledger?: CostLedger } = {}): Promise<EvalResult> {
    const violation = fastFailCheck(input.reply);
    if (violation) {
      this.log.warn({ violation: violation.violation, category: input.category }, 'Reply failed fast-fail check');
      return {
        disposition: violation.disposition,
        confidence: 'high',
        reasons: [violation.violation],
        tier: 'fast-fail',
      };
    }

    // No caller signal: once the gate has a reply it must reach a disposition
    const judged = await this.judge.judge(input, { ledger: opts.ledger });
    const policyReasons = this.policyReasons(input);

    if (!judged.ok) {
      this.log.warn({ error: judged.error }, 'Judge unavailable; forcing draft');
      return { disposition: 'draft', confidence: 'low', reasons: ['judge_unavailable', ...policyReasons], tier: 'judge' };
    }

    const { verdict } = judged;
    const scores = { ...verdict.checks };

    if (verdict.decision === 'escalate') {
      return {
        disposition: 'escalate',
        confidence: verdict.confidence,
        reasons: ['judge_escalation', ...this.verdictReasons(verdict), ...policyReasons],
        tier: 'judge',
        scores,
      };
    }

    const reasons = orderReasons([
      ...this.verdictReasons(verdict),
      ...policyReasons,
      ...(verdict.decision === 'draft' ? ['judge_draft'] : []),
    ]);

    if (reasons.length === 0) {
      return { disposition: 'send', confidence: verdict.confidence, reasons: [], tier: 'judge', scores };
    }
    return { disposition: 'draft', confidence: verdict.confidence, reasons, tier: 'judge', scores };
  }

  /** Reasons that hold whatever the judge says */
  private policyReasons(input: GateInput): string[] {
    const reasons: string[] = [];
    if (input.outstanding.isOutstanding) {
      reasons.push(`outstanding_signal:${input.outstanding.trigger}`);
    }
    if (confidenceRank(input.outstanding.confidence) < confidenceRank(this.policy.outstandingMinConfidence)) {
      reasons.push('outstanding_unverified');
    }
    if (input.category === 'unknown') {
      reasons.push('unclassified');
    }
    if (input.degraded) {
      reasons.push('degraded');
    }
    if (this.categories.get(input.category).autoSendPhase > this.policy.autoSendPhase) {
      reasons.push('auto_send_disabled');
    }
    return reasons;
  }

  private verdictReasons(verdict: JudgeVerdict): string[] {
    const reasons: string[] = [];
    if (verdict.confidence !== 'high') {
      reasons.push('low_confidence');
    }
    for (const check of JUDGE_CHECKS) {
      const threshold = check === 'safety' ? this.policy.safetyThreshold : this.policy.scoreThreshold;
      if (verdict.checks[check] < threshold) {
        reasons.push(`score_below_threshold:${check}`);
      }
    }
    return reasons;
  }
}

const REASON_ORDER = [
  'outstanding_signal',
  'outstanding_unverified',
  'low_confidence',
  'score_below_threshold',
  'unclassified',
  'degraded',
  'judge_draft',
  'auto_send_disabled',
];

function reasonOrder(reason: string): number {
  const index = REASON_ORDER.indexOf(reason.split(':')[0]);
  return index === -1 ? REASON_ORDER.length : index;
}

function orderReasons(reasons: string[]): string[] {
  return [...reasons].sort((a, b) => reasonOrder(a) - reasonOrder(b));
}
