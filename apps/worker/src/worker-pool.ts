// Worker Pool - polls the dispatch queue and runs up to N jobs concurrently

import { DispatchMessage, JobQueue, errorMessage, logger } from '@vidgen/core';
import type { JobExecutor } from './job-executor.js';

export interface WorkerPoolOptions {
  workerId: string;
  concurrency: number;
  pollIntervalMs: number;
  /** Claims older than this are returned to the queue at start. */
  staleClaimMs: number;
}

interface InFlightJob {
  controller: AbortController;
  done: Promise<void>;
}

export class WorkerPool {
  private running = false;
  private pollTimeout?: NodeJS.Timeout;
  private readonly inFlight = new Map<string, InFlightJob>();

  constructor(
    private readonly queue: JobQueue,
    private readonly executor: JobExecutor,
    private readonly options: WorkerPoolOptions
  ) {}

  get activeJobs(): string[] {
    return [...this.inFlight.keys()];
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      logger.warn(`Worker ${this.options.workerId} is already running`);
      return;
    }

    logger.info(`Starting worker ${this.options.workerId} with ${this.options.concurrency} slot(s)`);
    await this.queue.recoverStale(this.options.staleClaimMs);
    this.running = true;
    this.schedulePoll(0);
  }

  /** Stop polling, abort in-flight calls and wait for them to record their outcome. */
  async stop(): Promise<void> {
    if (!this.running && this.inFlight.size === 0) return;

    logger.info(`Stopping worker ${this.options.workerId}...`);
    this.running = false;
    if (this.pollTimeout) {
      clearTimeout(this.pollTimeout);
      this.pollTimeout = undefined;
    }

    for (const job of this.inFlight.values()) {
      job.controller.abort(new Error('Worker shutdown'));
    }
    await this.drain();
    logger.info(`Worker ${this.options.workerId} stopped`);
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()].map(job => job.done));
  }

  /** Claim messages until every slot is busy or the queue is empty. */
  async pollOnce(): Promise<number> {
    let launched = 0;
    while (this.inFlight.size < this.options.concurrency) {
      const message = await this.queue.claim();
      if (!message) break;

      if (this.inFlight.has(message.job_id)) {
        logger.warn(`Job ${message.job_id} is already running on this worker, ignoring duplicate`);
        await this.queue.ack(message.job_id);
        continue;
      }

      this.launch(message);
      launched++;
    }
    return launched;
  }

  private schedulePoll(delayMs: number): void {
    if (!this.running) return;

    this.pollTimeout = setTimeout(() => {
      void this.pollOnce()
        .catch(error => {
          logger.error(`Worker ${this.options.workerId} polling error: ${errorMessage(error)}`);
        })
        .finally(() => this.schedulePoll(this.options.pollIntervalMs));
    }, delayMs);
  }

  private launch(message: DispatchMessage): void {
    const controller = new AbortController();
    const done = this.runJob(message, controller.signal).finally(() => {
      this.inFlight.delete(message.job_id);
    });
    this.inFlight.set(message.job_id, { controller, done });
  }

  private async runJob(message: DispatchMessage, signal: AbortSignal): Promise<void> {
    try {
      const outcome = await this.executor.execute(message, { signal });
      logger.debug(`Job ${message.job_id} finished with outcome ${outcome}`);
    } catch (error) {
      logger.error(`Unexpected error executing job ${message.job_id}: ${errorMessage(error)}`);
    }

    try {
      await this.queue.ack(message.job_id);
    } catch (error) {
      logger.error(`Failed to acknowledge job ${message.job_id}: ${errorMessage(error)}`);
    }
  }
}
