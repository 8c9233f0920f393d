import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CanonicalResult, InMemoryJobStore, JobStatus } from '@vidgen/core';
import { ProviderRegistryBuilder } from '../connector-manager.js';
import { JobExecutor } from '../job-executor.js';
import { WorkerPool } from '../worker-pool.js';
import { ArrayQueue } from '../test/array-queue.js';
import { FakeConnector, sampleResult, untilAborted } from '../test/fake-connector.js';

describe('WorkerPool', () => {
  let store: InMemoryJobStore;
  let queue: ArrayQueue;
  let connector: FakeConnector;
  let pool: WorkerPool;
  let release: () => void;

  const submit = async (prompt: string): Promise<string> => {
    const id = await store.insert({
      tenant_id: 'tenant-1',
      user_id: 'user-1',
      provider: 'fake',
      model: 'fake-video-1',
      parameters: { prompt },
      is_async: true,
    });
    await queue.enqueue({ job_id: id, provider: 'fake', model: 'fake-video-1', parameters: { prompt } });
    return id;
  };

  beforeEach(() => {
    store = new InMemoryJobStore();
    queue = new ArrayQueue();
    connector = new FakeConnector();

    // Calls block until released
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    connector.handler = async (model, params): Promise<CanonicalResult> => {
      await gate;
      return sampleResult(model, params);
    };

    const registry = new ProviderRegistryBuilder().register(connector).build('fake');
    const executor = new JobExecutor(store, registry, { timeLimitMs: 60_000 });
    pool = new WorkerPool(queue, executor, {
      workerId: 'worker-test',
      concurrency: 2,
      pollIntervalMs: 10,
      staleClaimMs: 7_200_000,
    });
  });

  afterEach(async () => {
    release();
    await pool.stop();
  });

  it('fills free slots and leaves the rest queued', async () => {
    const [first, second] = [await submit('one'), await submit('two')];
    const third = await submit('three');

    await expect(pool.pollOnce()).resolves.toBe(2);

    expect(pool.activeJobs).toEqual([first, second]);
    expect(queue.pending.map(message => message.job_id)).toEqual([third]);
    await expect(pool.pollOnce()).resolves.toBe(0);
  });

  it('acknowledges each message after its outcome is recorded', async () => {
    const id = await submit('one');
    await pool.pollOnce();

    release();
    await pool.drain();

    expect(queue.acked).toEqual([id]);
    expect((await store.findById(id))?.status).toBe(JobStatus.COMPLETED);
    expect(pool.activeJobs).toEqual([]);
  });

  it('drops a duplicate delivery of a job already running here', async () => {
    const id = await submit('one');
    await pool.pollOnce();
    queue.pending.push({
      job_id: id,
      provider: 'fake',
      model: 'fake-video-1',
      parameters: { prompt: 'one' },
      enqueued_at: '2024-01-01T00:00:00.000Z',
    });

    await expect(pool.pollOnce()).resolves.toBe(0);

    expect(queue.acked).toEqual([id]);
    expect(pool.activeJobs).toEqual([id]);
  });

  it('aborts in-flight calls on stop and records the shutdown', async () => {
    connector.handler = (_model, _params, options) => untilAborted(options.signal);
    const id = await submit('one');
    await pool.pollOnce();

    await pool.stop();

    const job = await store.findById(id);
    expect(job?.status).toBe(JobStatus.FAILED);
    expect(job?.error).toBe('remote_call: Worker shutdown');
    expect(queue.acked).toEqual([id]);
  });

  it('recovers stale claims and polls once started', async () => {
    release();
    const id = await submit('one');

    await pool.start();

    expect(queue.recoveredWith).toBe(7_200_000);
    expect(pool.isRunning).toBe(true);
    await vi.waitFor(async () => {
      expect((await store.findById(id))?.status).toBe(JobStatus.COMPLETED);
    });
  });
});
