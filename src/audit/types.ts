/**
 * Append-only audit trail. Each event carries the SHA-256 hash of its
 * content chained over the previous event's hash.
 */

/** The closed set of audited actions, grouped by category */
export const AUDIT_ACTIONS = {
  turn: ['turn_finalized'],
  escalation: ['safety_prefilter'],
  tool_execution: ['tool_executed'],
  confirmation: ['confirmation_approved', 'confirmation_rejected', 'confirmation_expired'],
  governance_violation: ['tool_not_allowed', 'invalid_arguments', 'confirmation_unavailable'],
} as const;

export type AuditCategory = keyof typeof AUDIT_ACTIONS;
export type AuditAction<C extends AuditCategory = AuditCategory> = (typeof AUDIT_ACTIONS)[C][number];

/** What a caller records; ids and hashes are added by the service */
export interface AuditEntry<C extends AuditCategory = AuditCategory> {
  category: C;
  action: AuditAction<C>;
  /** 'pipeline', 'system', or the reviewer who resolved a confirmation */
  actor: string;
  sessionId?: string;
  turnId?: string;
  callId?: string;
  details?: Record<string, unknown>;
}

export interface AuditEvent {
  eventId: string;
  timestamp: number;
  category: AuditCategory;
  action: AuditAction;
  actor: string;
  sessionId?: string;
  turnId?: string;
  callId?: string;
  /** PII-redacted */
  details: Record<string, unknown>;
  previousHash: string;
  dataHash: string;
}

export interface AuditFilter {
  sessionId?: string;
  turnId?: string;
  category?: AuditCategory;
  since?: number;
  until?: number;
  /** Most recent N after the other filters */
  limit?: number;
}

export interface AuditStore {
  append(event: AuditEvent): Promise<void>;
  query(filter: AuditFilter): Promise<AuditEvent[]>;
  /** Hash of the newest event, or the genesis marker */
  head(): Promise<string>;
  verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: string }>;
}
