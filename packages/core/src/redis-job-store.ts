// Redis Job Store - job documents as hashes, per-tenant and per-user sorted-set indexes for listing

import type { Redis } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import type { JobStore } from './interfaces/job-store.js';
import type { CanonicalResult } from './types/connector.js';
import {
  Job,
  JobFilter,
  JobPage,
  JobPatch,
  JobSort,
  JobStatus,
  NewJob,
  isJobStatus,
} from './types/job.js';
import { StoreError, errorMessage } from './errors.js';
import { parseParamObject } from './utils/params.js';
import { logger } from './utils/logger.js';

/**
 * Compare-and-set update for one job hash.
 * KEYS[1] job key; ARGV[1] now (ms); ARGV[2] comma separated allowed statuses
 * ('' = unguarded); ARGV[3..] field/value pairs.
 * Returns -1 when the job is missing, 0 when the guard rejects, otherwise the
 * new updated_at which is always greater than the previous one.
 */
const GUARDED_UPDATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return -1
end
local allowed = ARGV[2]
if allowed ~= '' then
  local current = redis.call('HGET', KEYS[1], 'status')
  local permitted = false
  for status in string.gmatch(allowed, '[^,]+') do
    if status == current then
      permitted = true
    end
  end
  if not permitted then
    return 0
  end
end
local previous = 0
local raw = redis.call('HGET', KEYS[1], 'updated_at')
if raw then
  previous = tonumber(raw) or 0
end
local now = tonumber(ARGV[1])
local stamp = now
if previous + 1 > now then
  stamp = previous + 1
end
for i = 3, #ARGV, 2 do
  redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
end
redis.call('HSET', KEYS[1], 'updated_at', tostring(stamp))
return stamp
`;

function isCanonicalResult(value: unknown): value is CanonicalResult {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'videos' in value &&
    Array.isArray(value.videos)
  );
}

export class RedisJobStore implements JobStore {
  private static readonly JOB_KEY = (id: string) => `job:${id}`;
  private static readonly TENANT_INDEX_KEY = (tenantId: string) => `jobs:tenant:${tenantId}`;
  private static readonly USER_INDEX_KEY = (tenantId: string, userId: string) =>
    `jobs:user:${tenantId}:${userId}`;

  constructor(
    private readonly redis: Redis,
    private readonly now: () => number = Date.now
  ) {}

  async insert(job: NewJob): Promise<string> {
    const id = uuidv4();
    const createdAt = this.now();

    try {
      const results = await this.redis
        .multi()
        .hset(RedisJobStore.JOB_KEY(id), {
          id,
          tenant_id: job.tenant_id,
          user_id: job.user_id,
          provider: job.provider,
          model: job.model,
          parameters: JSON.stringify(job.parameters),
          is_async: String(job.is_async),
          status: JobStatus.PENDING,
          created_at: String(createdAt),
          updated_at: String(createdAt),
        })
        .zadd(RedisJobStore.TENANT_INDEX_KEY(job.tenant_id), createdAt, id)
        .zadd(RedisJobStore.USER_INDEX_KEY(job.tenant_id, job.user_id), createdAt, id)
        .exec();

      const failed = results?.find(([error]) => error !== null);
      if (!results || failed) {
        throw new Error(failed?.[0]?.message ?? 'transaction aborted');
      }
    } catch (error) {
      logger.error(`Failed to insert job ${id}:`, error);
      throw new StoreError(`Failed to insert job: ${errorMessage(error)}`, { cause: error });
    }

    logger.debug(`Job ${id} stored`, { provider: job.provider, model: job.model });
    return id;
  }

  async findById(id: string): Promise<Job | null> {
    let data: Record<string, string>;
    try {
      data = await this.redis.hgetall(RedisJobStore.JOB_KEY(id));
    } catch (error) {
      logger.error(`Failed to load job ${id}:`, error);
      throw new StoreError(`Failed to load job ${id}: ${errorMessage(error)}`, { cause: error });
    }
    return this.deserialize(data);
  }

  async updateFields(
    id: string,
    patch: JobPatch,
    allowedFrom?: readonly JobStatus[]
  ): Promise<boolean> {
    const fields: string[] = [];
    if (patch.status !== undefined) fields.push('status', patch.status);
    if (patch.result !== undefined) fields.push('result', JSON.stringify(patch.result));
    if (patch.error !== undefined) fields.push('error', patch.error);

    let outcome: unknown;
    try {
      outcome = await this.redis.eval(
        GUARDED_UPDATE_SCRIPT,
        1,
        RedisJobStore.JOB_KEY(id),
        String(this.now()),
        (allowedFrom ?? []).join(','),
        ...fields
      );
    } catch (error) {
      logger.error(`Failed to update job ${id}:`, error);
      throw new StoreError(`Failed to update job ${id}: ${errorMessage(error)}`, { cause: error });
    }

    const stamp = Number(outcome);
    if (stamp === -1) {
      logger.warn(`Update skipped, job ${id} does not exist`);
      return false;
    }
    if (stamp === 0) {
      logger.info(`Update rejected by status guard for job ${id}`, {
        target_status: patch.status,
        allowed_from: allowedFrom,
      });
      return false;
    }
    return true;
  }

  /**
   * Unfiltered listings by creation time page the index itself and load only
   * the requested jobs. Status or model filters and other sort fields load the
   * whole index (tenant or user) and filter in memory.
   */
  async countAndFind(
    filter: JobFilter,
    sort: JobSort,
    skip: number,
    limit: number
  ): Promise<JobPage> {
    const indexKey =
      filter.user_id === undefined
        ? RedisJobStore.TENANT_INDEX_KEY(filter.tenant_id)
        : RedisJobStore.USER_INDEX_KEY(filter.tenant_id, filter.user_id);

    try {
      if (filter.status === undefined && filter.model === undefined && sort.field === 'created_at') {
        const total = await this.redis.zcard(indexKey);
        if (limit <= 0 || skip >= total) {
          return { items: [], total };
        }
        const stop = skip + limit - 1;
        const ids = sort.descending
          ? await this.redis.zrevrange(indexKey, skip, stop)
          : await this.redis.zrange(indexKey, skip, stop);
        return { items: await this.loadJobs(ids), total };
      }

      const jobs = await this.loadJobs(await this.redis.zrange(indexKey, 0, -1));
      const matching = jobs.filter(
        job =>
          (filter.user_id === undefined || job.user_id === filter.user_id) &&
          (filter.status === undefined || job.status === filter.status) &&
          (filter.model === undefined || job.model === filter.model)
      );

      const direction = sort.descending ? -1 : 1;
      matching.sort((a, b) => {
        const left = a[sort.field];
        const right = b[sort.field];
        if (left === right) return a.id < b.id ? -direction : direction;
        return left < right ? -direction : direction;
      });

      return {
        items: matching.slice(skip, skip + limit),
        total: matching.length,
      };
    } catch (error) {
      logger.error(`Failed to list jobs for tenant ${filter.tenant_id}:`, error);
      throw new StoreError(`Failed to list jobs: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async loadJobs(ids: string[]): Promise<Job[]> {
    if (ids.length === 0) return [];

    const pipeline = this.redis.pipeline();
    for (const id of ids) {
      pipeline.hgetall(RedisJobStore.JOB_KEY(id));
    }

    const jobs: Job[] = [];
    for (const [error, data] of (await pipeline.exec()) ?? []) {
      if (error) throw error;
      if (!isStringRecord(data)) continue;
      const job = this.deserialize(data);
      if (job) jobs.push(job);
    }
    return jobs;
  }

  private deserialize(data: Record<string, string>): Job | null {
    if (!data.id || !data.status || !isJobStatus(data.status)) {
      return null;
    }

    const job: Job = {
      id: data.id,
      tenant_id: data.tenant_id ?? '',
      user_id: data.user_id ?? '',
      provider: data.provider ?? '',
      model: data.model ?? '',
      parameters: parseParamObject(data.parameters) ?? {},
      is_async: data.is_async !== 'false',
      status: data.status,
      created_at: new Date(Number(data.created_at)).toISOString(),
      updated_at: new Date(Number(data.updated_at)).toISOString(),
    };

    if (data.result) {
      const result = safeJsonParse(data.result);
      if (isCanonicalResult(result)) {
        job.result = result;
      } else {
        logger.warn(`Job ${data.id} has an unreadable result payload`);
      }
    }
    if (data.error !== undefined) {
      job.error = data.error;
    }
    return job;
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(item => typeof item === 'string')
  );
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

