import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { CompletionBackend } from '../llm/types';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';
import { logger } from '../observability/logger';

export interface ReadinessResult {
  status: 'ok' | 'error' | 'skipped';
  latencyMs?: number;
}

/** A readiness dependency; one source may report several named checks */
export type ReadinessSource = () => Promise<Record<string, ReadinessResult>>;

export function redisReadiness(redis?: Redis): ReadinessSource {
  return async () => {
    if (!redis) return { redis: { status: 'skipped' } };
    const start = Date.now();
    try {
      await redis.ping();
      return { redis: { status: 'ok', latencyMs: Date.now() - start } };
    } catch (err) {
      logger.warn({ err }, 'Readiness: Redis ping failed');
      return { redis: { status: 'error', latencyMs: Date.now() - start } };
    }
  };
}

export function llmReadiness(llm?: CompletionBackend): ReadinessSource {
  return async () => {
    if (!llm) return { llm: { status: 'skipped' } };
    try {
      const providers = await llm.healthCheck();
      return Object.fromEntries(
        Object.entries(providers).map(([name, check]): [string, ReadinessResult] => [
          `llm_${name}`,
          { status: check.status === 'ok' ? 'ok' : 'error', latencyMs: check.latencyMs },
        ]),
      );
    } catch (err) {
      logger.warn({ err }, 'Readiness: LLM health check failed');
      return { llm: { status: 'error' } };
    }
  };
}

/**
 * GET /health   liveness
 * GET /ready    every readiness check; 503 when any check errors
 * GET /metrics  Prometheus exposition, when enabled
 */
export function registerHealthRoutes(app: FastifyInstance, sources: ReadinessSource[]): void {
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/ready', async (_req, reply) => {
    const results = await Promise.all(sources.map((source) => source()));
    const checks: Record<string, ReadinessResult> = {};
    for (const result of results) Object.assign(checks, result);
    const ready = Object.values(checks).every((c) => c.status !== 'error');

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      reply.header('Content-Type', getContentType());
      return reply.send(await getMetrics());
    });
  }
}
