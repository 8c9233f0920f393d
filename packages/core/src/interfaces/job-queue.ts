import type { DispatchMessage } from '../types/job.js';

/**
 * At-least-once dispatch queue. A claimed message stays active until it is
 * acknowledged; stale active messages can be returned to the pending set.
 */
export interface JobQueue {
  enqueue(message: Omit<DispatchMessage, 'enqueued_at'>): Promise<void>;
  claim(): Promise<DispatchMessage | null>;
  ack(jobId: string): Promise<void>;
  recoverStale(olderThanMs: number): Promise<number>;
}
