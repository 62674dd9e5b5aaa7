import Redis from 'ioredis';
import { HistoryStore, TurnDisposition, TurnRecord } from './types';
import { ConversationTurn } from '../config/types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const HISTORY_TTL = 30 * 24 * 60 * 60; // 30 days
const MAX_TURNS = 50;

function toRecord(turn: ConversationTurn, outcome: TurnDisposition): TurnRecord {
  return {
    turnId: turn.turnId,
    sessionId: turn.sessionId,
    channel: turn.channel,
    text: turn.text,
    receivedAt: turn.receivedAt,
    category: outcome.category,
    disposition: outcome.disposition,
    tier: outcome.tier,
    reasons: [...outcome.reasons],
    reply: outcome.reply,
    outstandingTrigger: outcome.outstandingTrigger,
    finalizedAt: Date.now(),
  };
}

function isTurnRecord(value: unknown): value is TurnRecord {
  return typeof value === 'object' && value !== null && 'turnId' in value && 'disposition' in value;
}

/**
 * Redis-backed history. One list per session, newest at the head.
 */
export class RedisHistoryStore implements HistoryStore {
  private readonly prefix = `${env.redis.keyPrefix}history:`;

  constructor(private readonly redis: Redis) {}

  private key(sessionId: string): string {
    return `${this.prefix}${sessionId}`;
  }

  async recentTurns(sessionId: string, limit: number): Promise<TurnRecord[]> {
    if (limit <= 0) return [];
    const raw = await this.redis.lrange(this.key(sessionId), 0, limit - 1);
    return raw.map((r): unknown => JSON.parse(r)).filter(isTurnRecord);
  }

  async append(turn: ConversationTurn, outcome: TurnDisposition): Promise<void> {
    const key = this.key(turn.sessionId);
    const results = await this.redis
      .multi()
      .lpush(key, JSON.stringify(toRecord(turn, outcome)))
      .ltrim(key, 0, MAX_TURNS - 1)
      .expire(key, HISTORY_TTL)
      .exec();

    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
      throw failed?.[0] ?? new Error('History append transaction aborted');
    }
  }
}

/**
 * In-memory history (dev/test fallback).
 */
export class InMemoryHistoryStore implements HistoryStore {
  private readonly sessions = new Map<string, TurnRecord[]>();

  async recentTurns(sessionId: string, limit: number): Promise<TurnRecord[]> {
    return (this.sessions.get(sessionId) ?? []).slice(0, Math.max(0, limit));
  }

  async append(turn: ConversationTurn, outcome: TurnDisposition): Promise<void> {
    const turns = this.sessions.get(turn.sessionId) ?? [];
    turns.unshift(toRecord(turn, outcome));
    this.sessions.set(turn.sessionId, turns.slice(0, MAX_TURNS));
  }
}

export function createHistoryStore(redis?: Redis): HistoryStore {
  if (redis) {
    logger.info('History store: Redis-backed');
    return new RedisHistoryStore(redis);
  }
  logger.info('History store: In-memory');
  return new InMemoryHistoryStore();
}
