import { createHash } from 'crypto';
import Redis from 'ioredis';
import { AuditEvent, AuditFilter, AuditStore } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export const GENESIS_HASH = 'genesis';

type HashedFields = Omit<AuditEvent, 'dataHash' | 'previousHash'>;

/** Field order is fixed so the hash does not depend on how the event was built */
export function computeHash(event: HashedFields, previousHash: string): string {
  const payload = JSON.stringify([
    event.eventId,
    event.timestamp,
    event.category,
    event.action,
    event.actor,
    event.sessionId ?? null,
    event.turnId ?? null,
    event.callId ?? null,
    event.details,
    previousHash,
  ]);
  return createHash('sha256').update(payload).digest('hex');
}

export function matchesFilter(event: AuditEvent, filter: AuditFilter): boolean {
  return (
    (filter.sessionId === undefined || event.sessionId === filter.sessionId) &&
    (filter.turnId === undefined || event.turnId === filter.turnId) &&
    (filter.category === undefined || event.category === filter.category) &&
    (filter.since === undefined || event.timestamp >= filter.since) &&
    (filter.until === undefined || event.timestamp <= filter.until)
  );
}

function select(events: AuditEvent[], filter: AuditFilter): AuditEvent[] {
  const matched = events.filter((event) => matchesFilter(event, filter));
  return filter.limit ? matched.slice(-filter.limit) : matched;
}

/** Each event must link to its predecessor and hash to its recorded value */
export function verifyChain(events: AuditEvent[]): { valid: boolean; brokenAt?: string } {
  let previous = GENESIS_HASH;
  for (const event of events) {
    if (event.previousHash !== previous || computeHash(event, previous) !== event.dataHash) {
      return { valid: false, brokenAt: event.eventId };
    }
    previous = event.dataHash;
  }
  return { valid: true };
}

function isAuditEvent(value: unknown): value is AuditEvent {
  return typeof value === 'object' && value !== null && 'eventId' in value && 'dataHash' in value && 'action' in value;
}

// ───── Redis Implementation ─────────────────────────────────────

/** One global list for the chain, plus a per-session index for lookups */
class RedisAuditStore implements AuditStore {
  private readonly log = logger.child({ component: 'audit-store' });
  private readonly prefix = `${env.redis.keyPrefix}audit:`;

  constructor(private readonly redis: Redis) {}

  async append(event: AuditEvent): Promise<void> {
    const serialized = JSON.stringify(event);
    const tx = this.redis.multi().rpush(`${this.prefix}chain`, serialized).set(`${this.prefix}head`, event.dataHash);
    if (event.sessionId) {
      tx.rpush(`${this.prefix}session:${event.sessionId}`, serialized);
    }
    const results = await tx.exec();
    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
      throw failed?.[0] ?? new Error('Audit append transaction aborted');
    }
  }

  async query(filter: AuditFilter): Promise<AuditEvent[]> {
    const key = filter.sessionId ? `${this.prefix}session:${filter.sessionId}` : `${this.prefix}chain`;
    try {
      return select(await this.read(key), filter);
    } catch (err) {
      this.log.error({ err, key }, 'Audit query failed');
      return [];
    }
  }

  async head(): Promise<string> {
    return (await this.redis.get(`${this.prefix}head`)) ?? GENESIS_HASH;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: string }> {
    return verifyChain(await this.read(`${this.prefix}chain`));
  }

  private async read(key: string): Promise<AuditEvent[]> {
    const raw = await this.redis.lrange(key, 0, -1);
    return raw.map((r): unknown => JSON.parse(r)).filter(isAuditEvent);
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryAuditStore implements AuditStore {
  private readonly events: AuditEvent[] = [];

  async append(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }

  async query(filter: AuditFilter): Promise<AuditEvent[]> {
    return select(this.events, filter);
  }

  async head(): Promise<string> {
    return this.events[this.events.length - 1]?.dataHash ?? GENESIS_HASH;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: string }> {
    return verifyChain(this.events);
  }
}

export function createAuditStore(redis?: Redis): AuditStore {
  if (redis) {
    logger.info('Audit store: Redis-backed');
    return new RedisAuditStore(redis);
  }
  logger.info('Audit store: In-memory');
  return new InMemoryAuditStore();
}
