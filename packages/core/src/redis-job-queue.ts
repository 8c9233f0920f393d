// Redis Job Queue - pending sorted set, atomic pending-to-active claim, active set for redelivery

import type { Redis } from 'ioredis';
import type { JobQueue } from './interfaces/job-queue.js';
import type { DispatchMessage } from './types/job.js';
import { StoreError, errorMessage } from './errors.js';
import { isParamObject } from './utils/params.js';
import { logger } from './utils/logger.js';

const CLAIM_ATTEMPTS = 5;

// Oldest pending id moves to the active set in one step; returns {id, payload} or nil
const CLAIM_SCRIPT = `
local ids = redis.call('ZRANGE', KEYS[1], 0, 0)
if #ids == 0 then
  return nil
end
local id = ids[1]
redis.call('ZREM', KEYS[1], id)
redis.call('ZADD', KEYS[2], ARGV[1], id)
local raw = redis.call('HGET', KEYS[3], id)
if not raw then
  raw = ''
end
return {id, raw}
`;

// Active ids claimed at or before ARGV[1] go back to pending at ARGV[2]
const RECOVER_SCRIPT = `
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
for _, id in ipairs(ids) do
  redis.call('ZREM', KEYS[1], id)
  redis.call('ZADD', KEYS[2], ARGV[2], id)
end
return #ids
`;

function isClaimReply(value: unknown): value is [string, string] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string'
  );
}

function isDispatchMessage(value: unknown): value is DispatchMessage {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'job_id' in value &&
    typeof value.job_id === 'string' &&
    'provider' in value &&
    typeof value.provider === 'string' &&
    'model' in value &&
    typeof value.model === 'string' &&
    'parameters' in value &&
    isParamObject(value.parameters) &&
    'enqueued_at' in value &&
    typeof value.enqueued_at === 'string'
  );
}

export class RedisJobQueue implements JobQueue {
  private static readonly PENDING_KEY = 'jobs:pending';
  private static readonly ACTIVE_KEY = 'jobs:active';
  private static readonly MESSAGE_KEY = 'jobs:dispatch';

  constructor(
    private readonly redis: Redis,
    private readonly now: () => number = Date.now
  ) {}

  async enqueue(message: Omit<DispatchMessage, 'enqueued_at'>): Promise<void> {
    const enqueuedAt = this.now();
    const payload: DispatchMessage = {
      ...message,
      enqueued_at: new Date(enqueuedAt).toISOString(),
    };

    try {
      await this.redis
        .multi()
        .hset(RedisJobQueue.MESSAGE_KEY, message.job_id, JSON.stringify(payload))
        .zadd(RedisJobQueue.PENDING_KEY, enqueuedAt, message.job_id)
        .exec();
    } catch (error) {
      logger.error(`Failed to enqueue job ${message.job_id}:`, error);
      throw new StoreError(`Failed to enqueue job ${message.job_id}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    logger.info(`Job ${message.job_id} queued`, { provider: message.provider, model: message.model });
  }

  /**
   * Oldest pending message first. The move from pending to active is a single
   * script, so a message is always in one of the two sets.
   */
  async claim(): Promise<DispatchMessage | null> {
    try {
      for (let attempt = 0; attempt < CLAIM_ATTEMPTS; attempt++) {
        const reply: unknown = await this.redis.eval(
          CLAIM_SCRIPT,
          3,
          RedisJobQueue.PENDING_KEY,
          RedisJobQueue.ACTIVE_KEY,
          RedisJobQueue.MESSAGE_KEY,
          String(this.now())
        );
        if (!isClaimReply(reply)) return null;

        const [jobId, raw] = reply;
        const message = raw ? safeParse(raw) : undefined;
        if (isDispatchMessage(message)) return message;

        logger.warn(`Dropping unreadable dispatch message for job ${jobId}`);
        await this.redis
          .multi()
          .zrem(RedisJobQueue.ACTIVE_KEY, jobId)
          .hdel(RedisJobQueue.MESSAGE_KEY, jobId)
          .exec();
      }
      return null;
    } catch (error) {
      logger.error('Failed to claim job from queue:', error);
      throw new StoreError(`Failed to claim job: ${errorMessage(error)}`, { cause: error });
    }
  }

  async ack(jobId: string): Promise<void> {
    try {
      await this.redis
        .multi()
        .zrem(RedisJobQueue.ACTIVE_KEY, jobId)
        .hdel(RedisJobQueue.MESSAGE_KEY, jobId)
        .exec();
    } catch (error) {
      logger.error(`Failed to acknowledge job ${jobId}:`, error);
      throw new StoreError(`Failed to acknowledge job ${jobId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /** Return messages claimed more than `olderThanMs` ago to the pending set. */
  async recoverStale(olderThanMs: number): Promise<number> {
    const now = this.now();
    try {
      const recovered = Number(
        await this.redis.eval(
          RECOVER_SCRIPT,
          2,
          RedisJobQueue.ACTIVE_KEY,
          RedisJobQueue.PENDING_KEY,
          String(now - olderThanMs),
          String(now)
        )
      );
      if (recovered > 0) {
        logger.warn(`Returned ${recovered} stale claimed job(s) to the pending queue`);
      }
      return recovered;
    } catch (error) {
      logger.error('Failed to recover stale jobs:', error);
      throw new StoreError(`Failed to recover stale jobs: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function safeParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
