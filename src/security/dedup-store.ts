/**
 * Inbound message deduplication.
 *
 * Redis SET NX with a TTL, or a bounded in-memory set ordered by first
 * sight with explicit eviction.
 */

import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export interface DedupStore {
  /** Returns true if this is a NEW (non-duplicate) message */
  isNew(messageId: string): Promise<boolean>;
  /** Release an id so a corrected redelivery is processed */
  forget(messageId: string): Promise<void>;
}

export interface DedupOptions {
  ttlSeconds: number;
  maxEntries: number;
}

const DEFAULT_OPTIONS: DedupOptions = {
  ttlSeconds: env.dedup.ttlSeconds,
  maxEntries: env.dedup.maxEntries,
};

// ───── Redis Implementation ─────────────────────────────────────

class RedisDedupStore implements DedupStore {
  private readonly prefix = `${env.redis.keyPrefix}dedup:`;

  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number,
  ) {}

  async isNew(messageId: string): Promise<boolean> {
    try {
      // SET NX returns 'OK' if key was set (new), null if exists (duplicate)
      const result = await this.redis.set(`${this.prefix}${messageId}`, '1', 'EX', this.ttlSeconds, 'NX');
      return result === 'OK';
    } catch (err) {
      logger.warn({ err }, 'Dedup check failed; allowing message');
      return true; // Fail open
    }
  }

  async forget(messageId: string): Promise<void> {
    await this.redis.del(`${this.prefix}${messageId}`);
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

/**
 * Time-indexed set. Map iteration order is insertion order, and entries are
 * never refreshed, so the first key is always the oldest.
 */
export class InMemoryDedupStore implements DedupStore {
  private readonly seen = new Map<string, number>();
  private readonly ttlMs: number;

  constructor(
    private readonly options: DedupOptions = DEFAULT_OPTIONS,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = options.ttlSeconds * 1000;
  }

  async isNew(messageId: string): Promise<boolean> {
    const now = this.now();
    this.evictExpired(now);

    if (this.seen.has(messageId)) {
      return false;
    }

    while (this.seen.size >= this.options.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }

    this.seen.set(messageId, now);
    return true;
  }

  async forget(messageId: string): Promise<void> {
    this.seen.delete(messageId);
  }

  /** Drop entries older than the TTL; returns how many were removed */
  evictExpired(now = this.now()): number {
    let removed = 0;
    for (const [key, firstSeen] of this.seen) {
      if (now - firstSeen < this.ttlMs) break;
      this.seen.delete(key);
      removed++;
    }
    return removed;
  }

  get size(): number {
    return this.seen.size;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createDedupStore(redis?: Redis, options: DedupOptions = DEFAULT_OPTIONS): DedupStore {
  if (redis) {
    logger.info({ ttlSeconds: options.ttlSeconds }, 'Dedup store: Redis-backed (SET NX)');
    return new RedisDedupStore(redis, options.ttlSeconds);
  }
  logger.info({ maxEntries: options.maxEntries }, 'Dedup store: In-memory');
  return new InMemoryDedupStore(options);
}
