import { describe, it, expect, beforeEach, vi } from 'vitest';
import RedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { StoreError } from '../errors.js';
import { RedisJobQueue } from '../redis-job-queue.js';

describe('RedisJobQueue', () => {
  let redis: Redis;
  let clock: number;
  let queue: RedisJobQueue;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    clock = 1_700_000_000_000;
    queue = new RedisJobQueue(redis, () => clock);
  });

  const message = (jobId: string) => ({
    job_id: jobId,
    provider: 'aliyun',
    model: 'wanx2.1-t2v-turbo',
    parameters: { prompt: 'a cat' },
  });

  it('should hand out messages oldest first', async () => {
    await queue.enqueue(message('job-1'));
    clock += 10;
    await queue.enqueue(message('job-2'));

    expect((await queue.claim())?.job_id).toBe('job-1');
    expect((await queue.claim())?.job_id).toBe('job-2');
    expect(await queue.claim()).toBeNull();
  });

  it('should carry the dispatch payload and enqueue time', async () => {
    await queue.enqueue(message('job-1'));

    expect(await queue.claim()).toEqual({
      ...message('job-1'),
      enqueued_at: '2023-11-14T22:13:20.000Z',
    });
  });

  it('should give a message to only one of two racing claimers', async () => {
    await queue.enqueue(message('job-1'));

    const claims = await Promise.all([queue.claim(), queue.claim()]);

    expect(claims.filter(claim => claim !== null)).toHaveLength(1);
  });

  it('should return unacknowledged claims to pending once they are stale', async () => {
    await queue.enqueue(message('job-1'));
    await queue.claim();

    clock += 60_000;
    expect(await queue.recoverStale(30_000)).toBe(1);
    expect((await queue.claim())?.job_id).toBe('job-1');
  });

  it('should not recover acknowledged claims', async () => {
    await queue.enqueue(message('job-1'));
    await queue.claim();
    await queue.ack('job-1');

    clock += 60_000;
    expect(await queue.recoverStale(30_000)).toBe(0);
    expect(await queue.claim()).toBeNull();
  });

  it('should keep a message recoverable when the claim fails mid-flight', async () => {
    await queue.enqueue(message('job-1'));
    vi.spyOn(redis, 'eval').mockRejectedValueOnce(new Error('connection lost'));

    await expect(queue.claim()).rejects.toBeInstanceOf(StoreError);

    expect(await redis.zrange('jobs:pending', 0, -1)).toEqual(['job-1']);
    expect(await redis.zrange('jobs:active', 0, -1)).toEqual([]);
    expect((await queue.claim())?.job_id).toBe('job-1');
  });

  it('should track a claimed message in the active set until it is acknowledged', async () => {
    await queue.enqueue(message('job-1'));
    await queue.claim();

    expect(await redis.zrange('jobs:pending', 0, -1)).toEqual([]);
    expect(await redis.zrange('jobs:active', 0, -1)).toEqual(['job-1']);

    clock += 10 * 3_600_000;
    expect(await queue.recoverStale(1000)).toBe(1);
    expect(await redis.zrange('jobs:active', 0, -1)).toEqual([]);
    expect((await queue.claim())?.job_id).toBe('job-1');
  });

  it('should drop unreadable messages and claim the next one', async () => {
    await queue.enqueue(message('job-1'));
    clock += 10;
    await queue.enqueue(message('job-2'));
    await redis.hset('jobs:dispatch', 'job-1', '{not json');

    expect((await queue.claim())?.job_id).toBe('job-2');
    expect(await redis.hexists('jobs:dispatch', 'job-1')).toBe(0);
    expect(await redis.zrange('jobs:active', 0, -1)).toEqual(['job-2']);
  });
});
