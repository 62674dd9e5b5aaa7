import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, orchestrator, redis } = await buildApp();

  // Overdue confirmations are rejected on a timer; their turns resume
  const sweeper = setInterval(() => {
    orchestrator
      .expireOverdueConfirmations()
      .catch((err: unknown) => logger.error({ err }, 'Confirmation sweep failed'));
  }, env.governance.sweepIntervalSeconds * 1000);
  sweeper.unref();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    clearInterval(sweeper);
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({
      port: env.port,
      env: env.nodeEnv,
      primaryProvider: env.llm.primaryProvider,
    }, 'Support turn engine started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
