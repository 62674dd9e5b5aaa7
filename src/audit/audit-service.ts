import { v4 as uuid } from 'uuid';
import { AuditCategory, AuditEntry, AuditEvent, AuditFilter, AuditStore } from './types';
import { computeHash, GENESIS_HASH } from './audit-store';
import { redactObject } from '../observability/pii-redactor';
import { logger } from '../observability/logger';

/**
 * Writes the audit chain. Appends are serialized so concurrent turns never
 * fork it; a failed append leaves the head where it was.
 */
export class AuditService {
  private head = GENESIS_HASH;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly log = logger.child({ component: 'audit' });

  constructor(private readonly store: AuditStore) {}

  async init(): Promise<void> {
    this.head = await this.store.head();
  }

  record<C extends AuditCategory>(entry: AuditEntry<C>): Promise<AuditEvent> {
    const next = this.tail.then(() => this.append(entry));
    this.tail = next.catch((err: unknown) => this.log.warn({ err, action: entry.action }, 'Audit append failed'));
    return next;
  }

  /**
   * Fire-and-forget variant for the pipeline: a failed audit write is logged,
   * never surfaced to the turn.
   */
  recordQuietly<C extends AuditCategory>(entry: AuditEntry<C>): void {
    this.record(entry).catch((err: unknown) => this.log.warn({ err, action: entry.action }, 'Audit log failed (non-blocking)'));
  }

  trail(filter: AuditFilter): Promise<AuditEvent[]> {
    return this.store.query(filter);
  }

  verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: string }> {
    return this.store.verifyIntegrity();
  }

  private async append<C extends AuditCategory>(entry: AuditEntry<C>): Promise<AuditEvent> {
    const fields = {
      eventId: uuid(),
      timestamp: Date.now(),
      category: entry.category,
      action: entry.action,
      actor: entry.actor,
      sessionId: entry.sessionId,
      turnId: entry.turnId,
      callId: entry.callId,
      details: redactObject(entry.details ?? {}),
    };
    const event: AuditEvent = { ...fields, previousHash: this.head, dataHash: computeHash(fields, this.head) };

    await this.store.append(event);
    this.head = event.dataHash;
    this.log.debug({ eventId: event.eventId, action: event.action }, 'Audit event recorded');
    return event;
  }
}

let auditService: AuditService | undefined;

/** Process-wide instance, set up by buildApp */
export function initAuditService(store: AuditStore): AuditService {
  auditService = new AuditService(store);
  return auditService;
}

export function getAuditService(): AuditService | undefined {
  return auditService;
}
