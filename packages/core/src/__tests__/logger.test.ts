import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import winston from 'winston';
import { createLogger, jobLogger, logger, loggerOptionsFromEnv } from '../utils/logger.js';

describe('logger', () => {
  it('reads its options from the environment', () => {
    expect(loggerOptionsFromEnv({})).toEqual({
      level: 'info',
      format: 'json',
      service: 'video-generation-service',
      silent: false,
      fileDir: undefined,
    });
    expect(
      loggerOptionsFromEnv({ LOG_LEVEL: 'debug', LOG_FORMAT: 'simple', APP_NAME: 'api', LOG_TO_FILE: 'true' })
    ).toMatchObject({ level: 'debug', format: 'simple', service: 'api', fileDir: '/tmp' });
  });

  it('creates a console-only logger without a file directory', () => {
    const instance = createLogger({ level: 'warn', format: 'simple', service: 'test', silent: true });

    expect(instance.level).toBe('warn');
    expect(instance.transports).toHaveLength(1);
    expect(instance.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('stamps job logger entries with the job id and extra fields', async () => {
    const stream = new PassThrough({ objectMode: true });
    const transport = new winston.transports.Stream({ stream });
    logger.add(transport);
    const written = new Promise<unknown>(resolve => stream.once('data', resolve));

    jobLogger('job-1', { provider: 'aliyun' }).info('Executing job job-1');

    await expect(written).resolves.toMatchObject({
      level: 'info',
      message: 'Executing job job-1',
      job_id: 'job-1',
      provider: 'aliyun',
      service: 'video-generation-service',
    });
    logger.remove(transport);
  });
});
