// Worker entry point - claims dispatch messages from Redis and executes them

import { config as loadEnv } from 'dotenv';
import { Redis } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { RedisJobQueue, RedisJobStore, loadConfig, logger } from '@vidgen/core';
import { createExecutionRuntime } from './runtime.js';
import { WorkerPool } from './worker-pool.js';

loadEnv();

async function main() {
  const config = loadConfig();
  const workerId = config.WORKER_ID ?? `worker-${uuidv4()}`;

  logger.info(`Starting worker ${workerId}`, {
    concurrency: config.WORKER_CONCURRENCY,
    default_provider: config.DEFAULT_PROVIDER,
  });
  if (process.env.LOG_LEVEL === 'debug') {
    logger.debug(`Connecting to Redis at: ${config.REDIS_URL}`);
  }

  const redis = new Redis(config.REDIS_URL, { maxRetriesPerRequest: 3 });
  const store = new RedisJobStore(redis);
  const queue = new RedisJobQueue(redis);
  const { artifacts, executor } = createExecutionRuntime(config, store);

  const pool = new WorkerPool(queue, executor, {
    workerId,
    concurrency: config.WORKER_CONCURRENCY,
    pollIntervalMs: config.WORKER_POLL_INTERVAL_MS,
    staleClaimMs: config.WORKER_STALE_CLAIM_MS,
  });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down worker...`);
    try {
      await pool.stop();
      redis.disconnect();
      logger.info('Worker shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await artifacts.sweep();
  await pool.start();
  logger.info(`Worker ${workerId} ready`);
}

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection:', reason);
  process.exit(1);
});

main().catch(error => {
  logger.error('Worker startup failed:', error);
  process.exit(1);
});
