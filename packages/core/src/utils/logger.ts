// Logger utility - structured winston logger shared by the api and worker processes

import winston from 'winston';

export interface LoggerOptions {
  level: string;
  format: 'json' | 'simple';
  service: string;
  silent?: boolean;
  fileDir?: string; // error.log and combined.log are written here when set
}

export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  return {
    level: env.LOG_LEVEL || 'info',
    format: env.LOG_FORMAT === 'simple' ? 'simple' : 'json',
    service: env.APP_NAME || 'video-generation-service',
    silent: env.LOG_SILENT === 'true',
    fileDir: env.LOG_TO_FILE === 'true' ? env.LOG_DIR || '/tmp' : undefined,
  };
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const instance = winston.createLogger({
    level: options.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      options.format === 'json'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple())
    ),
    defaultMeta: {
      service: options.service,
      version: process.env.npm_package_version || '1.0.0',
    },
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
        silent: options.silent,
      }),
    ],
  });

  if (options.fileDir) {
    const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());
    instance.add(
      new winston.transports.File({ filename: `${options.fileDir}/error.log`, level: 'error', format: fileFormat })
    );
    instance.add(new winston.transports.File({ filename: `${options.fileDir}/combined.log`, format: fileFormat }));
  }

  return instance;
}

export const logger = createLogger(loggerOptionsFromEnv());

/** Child logger that stamps every entry with the job id and any extra fields. */
export function jobLogger(jobId: string, meta: Record<string, string> = {}): winston.Logger {
  return logger.child({ job_id: jobId, ...meta });
}

export default logger;
