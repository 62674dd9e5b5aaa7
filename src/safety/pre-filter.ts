import { safetyPreFilterMatches } from '../observability/metrics';

export type SafetyTrigger = 'death_threat' | 'legal_threat' | 'bank_dispute' | 'self_harm' | 'violence_threat';

export interface MatchResult {
  trigger: SafetyTrigger;
  /** The text that matched, for the audit record */
  matched: string;
}

/** Fixed hand-off reply for pre-filter escalations */
export const HANDOFF_REPLY = "I'm connecting you with a support agent who can better assist you.";

/**
 * Ordered high-risk patterns. The first match in list order wins, so the
 * order here is part of the contract.
 */
const SAFETY_PATTERNS: ReadonlyArray<{ trigger: SafetyTrigger; pattern: RegExp }> = [
  { trigger: 'death_threat', pattern: /\b(kill|murder|die|death threat)\b/i },
  { trigger: 'legal_threat', pattern: /\b(sue|lawsuit|lawyer|legal action|court)\b/i },
  { trigger: 'bank_dispute', pattern: /\b(bank dispute|chargeback|dispute the charge)\b/i },
  { trigger: 'self_harm', pattern: /\b(suicide|end my life|harm myself)\b/i },
  { trigger: 'violence_threat', pattern: /\b(bomb|weapon|attack)\b/i },
];

/**
 * Synchronous safety screen over the raw message. Pure apart from the
 * match counter.
 */
export function check(text: string): MatchResult | null {
  for (const { trigger, pattern } of SAFETY_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      safetyPreFilterMatches.inc({ trigger });
      return { trigger, matched: match[0] };
    }
  }
  return null;
}
