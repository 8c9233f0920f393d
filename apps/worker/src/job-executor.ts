// Job Executor - runs one dispatched job through its connector and records the outcome

import {
  CanonicalResult,
  DispatchMessage,
  JobStatus,
  JobStore,
  RemoteTimeoutError,
  allowedSources,
  describeJobError,
  errorMessage,
  jobLogger,
  logger,
} from '@vidgen/core';
import type { ProviderRegistry } from './connector-manager.js';

export type ExecutionOutcome =
  | 'completed'
  | 'failed'
  | 'skipped' // job missing or already terminal before the call
  | 'superseded' // terminal write rejected, e.g. cancelled while running
  | 'unrecorded'; // store failed on the terminal write

export interface JobExecutorOptions {
  timeLimitMs: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Synchronous dispatch: rethrow the call error after recording it. */
  propagateErrors?: boolean;
}

export class JobExecutor {
  constructor(
    private readonly store: JobStore,
    private readonly registry: ProviderRegistry,
    private readonly options: JobExecutorOptions
  ) {}

  async execute(message: DispatchMessage, execOptions: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const jobId = message.job_id;

    if ((await this.markRunning(jobId)) === 'rejected') {
      logger.info(`Job ${jobId} is missing or already finished, skipping execution`);
      return 'skipped';
    }

    let result: CanonicalResult | undefined;
    let failure: unknown;

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new RemoteTimeoutError(`Job ${jobId} exceeded the time limit of ${this.options.timeLimitMs}ms`)
      );
    }, this.options.timeLimitMs);
    const forwardAbort = () => controller.abort(execOptions.signal?.reason);
    execOptions.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (execOptions.signal?.aborted) forwardAbort();

    try {
      const connector = this.registry.get(message.provider);
      jobLogger(jobId, { provider: message.provider, model: message.model }).info(`Executing job ${jobId}`);
      result = await connector.callModel(message.model, message.parameters, {
        signal: controller.signal,
        jobId,
      });
    } catch (error) {
      // An aborted call reports the abort reason, not the transport's cancellation error
      const reason: unknown = controller.signal.reason;
      failure = controller.signal.aborted && reason instanceof Error ? reason : error;
    } finally {
      clearTimeout(timer);
      execOptions.signal?.removeEventListener('abort', forwardAbort);
    }

    const outcome =
      result !== undefined
        ? await this.recordTerminal(jobId, { status: JobStatus.COMPLETED, result })
        : await this.recordTerminal(jobId, { status: JobStatus.FAILED, error: describeJobError(failure) });

    if (failure !== undefined && execOptions.propagateErrors) {
      throw failure;
    }
    return outcome;
  }

  /** Best-effort: a store failure here is logged and execution continues. */
  private async markRunning(jobId: string): Promise<'marked' | 'rejected' | 'unknown'> {
    try {
      const written = await this.store.updateFields(
        jobId,
        { status: JobStatus.RUNNING },
        allowedSources(JobStatus.RUNNING)
      );
      return written ? 'marked' : 'rejected';
    } catch (error) {
      logger.warn(`Could not mark job ${jobId} as running: ${errorMessage(error)}`);
      return 'unknown';
    }
  }

  private async recordTerminal(
    jobId: string,
    patch:
      | { status: JobStatus.COMPLETED; result: CanonicalResult }
      | { status: JobStatus.FAILED; error: string }
  ): Promise<ExecutionOutcome> {
    try {
      const written = await this.store.updateFields(jobId, patch, allowedSources(patch.status));
      if (!written) {
        logger.warn(`Terminal ${patch.status} write for job ${jobId} rejected; keeping stored state`);
        return 'superseded';
      }
    } catch (error) {
      logger.error(`Failed to record ${patch.status} for job ${jobId}: ${errorMessage(error)}`);
      return 'unrecorded';
    }

    if (patch.status === JobStatus.COMPLETED) {
      jobLogger(jobId).info(`Job ${jobId} completed`, { videos: patch.result.videos.length });
      return 'completed';
    }
    jobLogger(jobId).warn(`Job ${jobId} failed: ${patch.error}`);
    return 'failed';
  }
}
