// Poll schedule - attempt counting and next-poll timing for remote job polling

import { setTimeout as delay } from 'timers/promises';

export interface Sleeper {
  /** Rejects when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const timerSleeper: Sleeper = {
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await delay(ms, undefined, { signal });
  },
};

/**
 * Fixed-interval schedule with an attempt ceiling. Every attempt waits one
 * interval after the previous one (the first waits one interval after start).
 */
export class PollSchedule {
  private attemptCount = 0;
  private nextPollAt: number;

  constructor(
    readonly intervalMs: number,
    readonly maxAttempts: number,
    private readonly clock: () => number = Date.now
  ) {
    this.nextPollAt = clock() + intervalMs;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get exhausted(): boolean {
    return this.attemptCount >= this.maxAttempts;
  }

  /** Milliseconds to wait before the next attempt may run. */
  delayUntilNextPoll(): number {
    return Math.max(0, this.nextPollAt - this.clock());
  }

  /** Record an attempt and schedule the following one. Returns the attempt number. */
  recordAttempt(): number {
    this.attemptCount++;
    this.nextPollAt = this.clock() + this.intervalMs;
    return this.attemptCount;
  }
}
