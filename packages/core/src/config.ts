// Configuration - validated once from the environment at process start

import { z } from 'zod';

const booleanFlag = z
  .string()
  .transform(value => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const commaList = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

export const ConfigSchema = z.object({
  APP_NAME: z.string().default('video-generation-service'),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  DEFAULT_PROVIDER: z.string().min(1).default('aliyun'),
  DEFAULT_MODEL: z.string().min(1).default('wanx2.1-t2v-turbo'),
  ALIYUN_SUPPORTED_MODELS: commaList.optional(),
  ZHIPUAI_SUPPORTED_MODELS: commaList.optional(),

  ALIYUN_API_KEY: z.string().default(''),
  ALIYUN_BASE_URL: z.string().url().default('https://dashscope.aliyuncs.com/api/v1'),
  ALIYUN_API_URL: z.string().url().optional(),
  ZHIPUAI_API_KEY: z.string().default(''),
  ZHIPUAI_BASE_URL: z.string().url().default('https://open.bigmodel.cn/api/paas/v4'),

  DATA_DIR: z.string().default('./data'),
  TASK_TIME_LIMIT: z.coerce.number().int().positive().default(3600),
  POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(15000),
  POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(180),
  ARTIFACT_CACHE_TTL_HOURS: z.coerce.number().positive().default(24),

  MEDIA_BASE_PATH: z.string().default('/media'),
  MEDIA_DOWNLOAD_BASE_URL: z.string().default('http://localhost:8000/api/download'),
  PUBLIC_BASE_URL: z.string().default('http://localhost:8000'),

  API_PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGINS: commaList.default('*'),
  ENABLE_AUTH: booleanFlag.default('false'),
  AUTH_SERVICE_URL: z.string().url().default('http://localhost:8001'),
  SERVICE_NAME: z.string().default('video-generation'),

  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  WORKER_ID: z.string().optional(),
  WORKER_STALE_CLAIM_MS: z.coerce.number().int().positive().default(7_200_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from an environment map. Empty strings count as unset.
 * Throws with every offending key listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`FATAL: invalid configuration - ${issues}`);
  }
  return parsed.data;
}
