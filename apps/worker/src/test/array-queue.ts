// In-process JobQueue for pool and orchestrator tests

import type { DispatchMessage, JobQueue } from '@vidgen/core';

export class ArrayQueue implements JobQueue {
  readonly pending: DispatchMessage[] = [];
  readonly acked: string[] = [];
  recoveredWith?: number;

  async enqueue(message: Omit<DispatchMessage, 'enqueued_at'>): Promise<void> {
    this.pending.push({ ...message, enqueued_at: '2024-01-01T00:00:00.000Z' });
  }

  async claim(): Promise<DispatchMessage | null> {
    return this.pending.shift() ?? null;
  }

  async ack(jobId: string): Promise<void> {
    this.acked.push(jobId);
  }

  async recoverStale(olderThanMs: number): Promise<number> {
    this.recoveredWith = olderThanMs;
    return 0;
  }
}
