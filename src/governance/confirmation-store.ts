import Redis, { ChainableCommander } from 'ioredis';
import { GovernedToolCall, SuspendedTurn } from './types';
import { isTerminal } from './tool-call-state';
import { env } from '../config/env';
import { logger } from '../observability/logger';

/** Suspended state outlives the deadline so late resolutions still find their call */
const RETENTION_SECONDS = 7 * 24 * 60 * 60;

/**
 * Durable state for turns suspended on human confirmation. Resolution and
 * resume are claimed atomically, so each happens at most once per call or turn.
 */
export interface ConfirmationStore {
  suspend(state: SuspendedTurn, calls: GovernedToolCall[]): Promise<void>;
  loadTurn(turnId: string): Promise<SuspendedTurn | null>;
  getCall(callId: string): Promise<GovernedToolCall | null>;
  getCalls(callIds: string[]): Promise<GovernedToolCall[]>;
  /** Persist a call; terminal calls leave the pending and deadline indexes */
  saveCall(call: GovernedToolCall): Promise<void>;
  /** True for the first caller only */
  claimResolution(callId: string): Promise<boolean>;
  /** Give back a claim whose decision could not be stored */
  releaseResolution(callId: string): Promise<void>;
  /** True for the first caller only */
  claimResume(turnId: string): Promise<boolean>;
  pendingForSession(sessionId: string): Promise<GovernedToolCall[]>;
  /** Call ids of unresolved calls whose deadline is at or before `now` */
  overdue(now: number, limit?: number): Promise<string[]>;
}

function isGovernedCall(value: unknown): value is GovernedToolCall {
  return typeof value === 'object' && value !== null && 'callId' in value && 'state' in value && 'mode' in value;
}

function isSuspendedTurn(value: unknown): value is SuspendedTurn {
  return typeof value === 'object' && value !== null && 'turn' in value && 'callIds' in value;
}

function isAwaiting(call: GovernedToolCall): boolean {
  return call.state === 'awaiting_confirmation';
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisConfirmationStore implements ConfirmationStore {
  private readonly prefix = `${env.redis.keyPrefix}confirm:`;

  constructor(private readonly redis: Redis) {}

  private turnKey(turnId: string): string {
    return `${this.prefix}turn:${turnId}`;
  }

  private callKey(callId: string): string {
    return `${this.prefix}call:${callId}`;
  }

  private pendingKey(sessionId: string): string {
    return `${this.prefix}pending:${sessionId}`;
  }

  private get deadlineKey(): string {
    return `${this.prefix}deadlines`;
  }

  async suspend(state: SuspendedTurn, calls: GovernedToolCall[]): Promise<void> {
    const pipeline = this.redis.multi();
    pipeline.set(this.turnKey(state.turn.turnId), JSON.stringify(state), 'EX', RETENTION_SECONDS);
    for (const call of calls) {
      pipeline.set(this.callKey(call.callId), JSON.stringify(call), 'EX', RETENTION_SECONDS);
      if (isAwaiting(call)) {
        pipeline.sadd(this.pendingKey(call.sessionId), call.callId);
        pipeline.expire(this.pendingKey(call.sessionId), RETENTION_SECONDS);
        if (call.deadline !== undefined) {
          pipeline.zadd(this.deadlineKey, call.deadline, call.callId);
        }
      }
    }
    await this.execOrThrow(pipeline);
  }

  async loadTurn(turnId: string): Promise<SuspendedTurn | null> {
    const raw = await this.redis.get(this.turnKey(turnId));
    if (!raw) return null;
    const parsed: unknown = JSON.parse(raw);
    return isSuspendedTurn(parsed) ? parsed : null;
  }

  async getCall(callId: string): Promise<GovernedToolCall | null> {
    const raw = await this.redis.get(this.callKey(callId));
    if (!raw) return null;
    const parsed: unknown = JSON.parse(raw);
    return isGovernedCall(parsed) ? parsed : null;
  }

  async getCalls(callIds: string[]): Promise<GovernedToolCall[]> {
    if (callIds.length === 0) return [];
    const raw = await this.redis.mget(callIds.map((id) => this.callKey(id)));
    return raw
      .filter((r): r is string => r !== null)
      .map((r): unknown => JSON.parse(r))
      .filter(isGovernedCall);
  }

  async saveCall(call: GovernedToolCall): Promise<void> {
    const pipeline = this.redis.multi().set(this.callKey(call.callId), JSON.stringify(call), 'EX', RETENTION_SECONDS);
    if (isTerminal(call.state)) {
      pipeline.srem(this.pendingKey(call.sessionId), call.callId);
      pipeline.zrem(this.deadlineKey, call.callId);
    }
    await this.execOrThrow(pipeline);
  }

  async claimResolution(callId: string): Promise<boolean> {
    const result = await this.redis.set(`${this.prefix}claim:${callId}`, '1', 'EX', RETENTION_SECONDS, 'NX');
    return result === 'OK';
  }

  async releaseResolution(callId: string): Promise<void> {
    await this.redis.del(`${this.prefix}claim:${callId}`);
  }

  async claimResume(turnId: string): Promise<boolean> {
    const result = await this.redis.set(`${this.prefix}resume:${turnId}`, '1', 'EX', RETENTION_SECONDS, 'NX');
    return result === 'OK';
  }

  async pendingForSession(sessionId: string): Promise<GovernedToolCall[]> {
    const callIds = await this.redis.smembers(this.pendingKey(sessionId));
    const calls = await this.getCalls(callIds);
    return calls.filter(isAwaiting).sort((a, b) => (a.deadline ?? 0) - (b.deadline ?? 0));
  }

  async overdue(now: number, limit = 100): Promise<string[]> {
    return this.redis.zrangebyscore(this.deadlineKey, '-inf', now, 'LIMIT', 0, limit);
  }

  private async execOrThrow(pipeline: ChainableCommander): Promise<void> {
    const results = await pipeline.exec();
    const failed = results?.find(([err]) => err !== null);
    if (!results || failed) {
      throw failed?.[0] ?? new Error('Confirmation store transaction aborted');
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryConfirmationStore implements ConfirmationStore {
  private readonly turns = new Map<string, SuspendedTurn>();
  private readonly calls = new Map<string, GovernedToolCall>();
  private readonly resolutionClaims = new Set<string>();
  private readonly resumeClaims = new Set<string>();
  /** Turn id to the epoch ms it was suspended; Map order is insertion order */
  private readonly suspendedAt = new Map<string, number>();

  constructor(
    private readonly retentionMs = RETENTION_SECONDS * 1000,
    private readonly now: () => number = Date.now,
  ) {}

  async suspend(state: SuspendedTurn, calls: GovernedToolCall[]): Promise<void> {
    this.evictExpired();
    this.turns.set(state.turn.turnId, structuredClone(state));
    this.suspendedAt.delete(state.turn.turnId);
    this.suspendedAt.set(state.turn.turnId, this.now());
    for (const call of calls) {
      this.calls.set(call.callId, structuredClone(call));
    }
  }

  /** Drop turns past retention together with their calls and claims */
  evictExpired(): number {
    const cutoff = this.now() - this.retentionMs;
    let evicted = 0;
    for (const [turnId, at] of this.suspendedAt) {
      if (at > cutoff) break;
      const state = this.turns.get(turnId);
      for (const callId of state?.callIds ?? []) {
        this.calls.delete(callId);
        this.resolutionClaims.delete(callId);
      }
      this.turns.delete(turnId);
      this.resumeClaims.delete(turnId);
      this.suspendedAt.delete(turnId);
      evicted++;
    }
    return evicted;
  }

  async loadTurn(turnId: string): Promise<SuspendedTurn | null> {
    const state = this.turns.get(turnId);
    return state ? structuredClone(state) : null;
  }

  async getCall(callId: string): Promise<GovernedToolCall | null> {
    const call = this.calls.get(callId);
    return call ? structuredClone(call) : null;
  }

  async getCalls(callIds: string[]): Promise<GovernedToolCall[]> {
    const found: GovernedToolCall[] = [];
    for (const id of callIds) {
      const call = this.calls.get(id);
      if (call) found.push(structuredClone(call));
    }
    return found;
  }

  async saveCall(call: GovernedToolCall): Promise<void> {
    this.calls.set(call.callId, structuredClone(call));
  }

  async claimResolution(callId: string): Promise<boolean> {
    if (this.resolutionClaims.has(callId)) return false;
    this.resolutionClaims.add(callId);
    return true;
  }

  async releaseResolution(callId: string): Promise<void> {
    this.resolutionClaims.delete(callId);
  }

  async claimResume(turnId: string): Promise<boolean> {
    if (this.resumeClaims.has(turnId)) return false;
    this.resumeClaims.add(turnId);
    return true;
  }

  async pendingForSession(sessionId: string): Promise<GovernedToolCall[]> {
    return [...this.calls.values()]
      .filter((call) => call.sessionId === sessionId && isAwaiting(call))
      .sort((a, b) => (a.deadline ?? 0) - (b.deadline ?? 0))
      .map((call) => structuredClone(call));
  }

  async overdue(now: number, limit = 100): Promise<string[]> {
    return [...this.calls.values()]
      .filter((call) => isAwaiting(call) && call.deadline !== undefined && call.deadline <= now)
      .slice(0, limit)
      .map((call) => call.callId);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createConfirmationStore(redis?: Redis): ConfirmationStore {
  if (redis) {
    logger.info('Confirmation store: Redis-backed');
    return new RedisConfirmationStore(redis);
  }
  logger.info('Confirmation store: In-memory');
  return new InMemoryConfirmationStore();
}
