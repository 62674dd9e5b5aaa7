import Redis from 'ioredis';
import { CorrectionRecord, CorrectionStore } from './types';
import { Category } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/** Only the newest corrections per category are ever injected, so older ones are trimmed */
const MAX_PER_CATEGORY = 50;
const CORRECTION_TTL_SECONDS = 90 * 24 * 60 * 60;

function isCorrectionRecord(value: unknown): value is CorrectionRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    'aiResponse' in value &&
    'humanEdit' in value &&
    'category' in value
  );
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryCorrectionStore implements CorrectionStore {
  private readonly byCategory = new Map<Category, CorrectionRecord[]>();

  async save(record: CorrectionRecord): Promise<void> {
    const list = this.byCategory.get(record.category) ?? [];
    list.unshift(record);
    list.length = Math.min(list.length, MAX_PER_CATEGORY);
    this.byCategory.set(record.category, list);
  }

  async recent(category: Category, limit: number): Promise<CorrectionRecord[]> {
    return (this.byCategory.get(category) ?? []).slice(0, limit);
  }
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisCorrectionStore implements CorrectionStore {
  private readonly log = logger.child({ component: 'correction-store' });
  private readonly prefix = `${env.redis.keyPrefix}corrections:`;

  constructor(private readonly redis: Redis) {}

  async save(record: CorrectionRecord): Promise<void> {
    const key = `${this.prefix}${record.category}`;
    const results = await this.redis
      .multi()
      .lpush(key, JSON.stringify(record))
      .ltrim(key, 0, MAX_PER_CATEGORY - 1)
      .expire(key, CORRECTION_TTL_SECONDS)
      .exec();
    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
      throw failed?.[0] ?? new Error('Correction save transaction aborted');
    }
  }

  async recent(category: Category, limit: number): Promise<CorrectionRecord[]> {
    if (limit <= 0) return [];
    const raw = await this.redis.lrange(`${this.prefix}${category}`, 0, limit - 1);
    const records: CorrectionRecord[] = [];
    for (const entry of raw) {
      const parsed: unknown = JSON.parse(entry);
      if (isCorrectionRecord(parsed)) {
        records.push(parsed);
      } else {
        this.log.warn({ category }, 'Skipping malformed correction record');
      }
    }
    return records;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createCorrectionStore(redis?: Redis): CorrectionStore {
  if (redis) {
    logger.info('Correction store: Redis-backed');
    return new RedisCorrectionStore(redis);
  }
  logger.info('Correction store: In-memory');
  return new InMemoryCorrectionStore();
}
