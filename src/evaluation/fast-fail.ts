import { Disposition } from '../config/types';
import { evalTierOneViolations } from '../observability/metrics';

export type FastFailViolation = 'confirmed_refund' | 'confirmed_cancellation' | 'confirmed_pause' | 'card_number_exposed';

export interface FastFailMatch {
  violation: FastFailViolation;
  disposition: Exclude<Disposition, 'send'>;
}

/**
 * Hard-rule violations in an outgoing reply, checked in order. A reply must
 * never claim an irreversible account change the pipeline did not make, and
 * must never carry a card number.
 */
const REPLY_VIOLATIONS: ReadonlyArray<FastFailMatch & { patterns: RegExp[] }> = [
  {
    violation: 'confirmed_refund',
    disposition: 'escalate',
    patterns: [
      /\b(processed|issued|approved) (a |your )?(refund|reimbursement)\b/i,
      /\brefund (has been|is now|was) (processed|issued|approved)\b/i,
    ],
  },
  {
    violation: 'confirmed_cancellation',
    disposition: 'draft',
    patterns: [
      /\b(cancelled|canceled) your subscription\b/i,
      /\bsubscription (has been|is now) (cancelled|canceled)\b/i,
    ],
  },
  {
    violation: 'confirmed_pause',
    disposition: 'draft',
    patterns: [
      /\b(paused|suspended) your subscription\b/i,
      /\bsubscription (has been|is now) (paused|suspended)\b/i,
    ],
  },
  {
    violation: 'card_number_exposed',
    disposition: 'escalate',
    patterns: [/\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/],
  },
];

/** First violation in list order, or null when the reply passes */
export function fastFailCheck(reply: string): FastFailMatch | null {
  for (const { violation, disposition, patterns } of REPLY_VIOLATIONS) {
    if (patterns.some((pattern) => pattern.test(reply))) {
      evalTierOneViolations.inc({ violation });
      return { violation, disposition };
    }
  }
  return null;
}
