// API Server Entry Point
import { config as loadEnv } from 'dotenv';
import { Redis } from 'ioredis';
import { RedisJobQueue, RedisJobStore, loadConfig, logger } from '@vidgen/core';
import { createExecutionRuntime } from '@vidgen/worker';
import { ApiServer } from './api-server.js';
import { AuthVerifier } from './auth.js';
import { JobOrchestrator } from './job-orchestrator.js';

loadEnv();

export * from './api-server.js';
export * from './auth.js';
export * from './job-orchestrator.js';

async function main() {
  const config = loadConfig();

  const redis = new Redis(config.REDIS_URL, { maxRetriesPerRequest: 3 });
  const store = new RedisJobStore(redis);
  const queue = new RedisJobQueue(redis);
  const { registry, executor } = createExecutionRuntime(config, store);

  const orchestrator = new JobOrchestrator(store, queue, registry, executor, {
    defaultModel: config.DEFAULT_MODEL,
  });
  const authVerifier = new AuthVerifier({
    baseUrl: config.AUTH_SERVICE_URL,
    serviceName: config.SERVICE_NAME,
  });

  logger.info('Starting API server with config:', {
    port: config.API_PORT,
    corsOrigins: config.CORS_ORIGINS,
    enableAuth: config.ENABLE_AUTH,
    providers: registry.names(),
  });

  const server = new ApiServer(
    {
      port: config.API_PORT,
      serviceName: config.SERVICE_NAME,
      corsOrigins: config.CORS_ORIGINS,
      dataDir: config.DATA_DIR,
      enableAuth: config.ENABLE_AUTH,
    },
    { orchestrator, registry, authVerifier }
  );

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      redis.disconnect();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.start();
  logger.info('API server started successfully');
}

// Only run main if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch(error => {
    logger.error('Unhandled error in main:', error);
    process.exit(1);
  });
}
