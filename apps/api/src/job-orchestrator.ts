/**
 * Job Orchestrator - owns the job lifecycle on the request path
 *
 * Creates jobs after provider validation, hands them to the dispatch queue (or
 * runs them inline for synchronous requests), and answers status, result,
 * cancel and listing queries.
 */

import {
  CanonicalResult,
  DispatchMessage,
  Job,
  JobFilter,
  JobNotFoundError,
  JobParameters,
  JobQueue,
  JobSort,
  JobStatus,
  JobStore,
  SORTABLE_JOB_FIELDS,
  SortableJobField,
  ValidationError,
  allowedSources,
  isJobStatus,
  logger,
} from '@vidgen/core';
import type { JobExecutor, ProviderRegistry } from '@vidgen/worker';

export const DEFAULT_ORDERING = '-created_at';
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface CreateJobRequest {
  tenant_id: string;
  user_id: string;
  provider?: string;
  model?: string;
  parameters: JobParameters;
  is_async: boolean;
}

export interface ListOptions {
  page: number;
  pageSize: number;
  ordering?: string;
  status?: string; // validated against JobStatus
}

export interface JobListing {
  items: Job[];
  total: number;
  page: number;
  page_size: number;
  total_pages: number;
}

export interface JobStatusView {
  task_id: string;
  status: JobStatus;
  created_at: string;
  updated_at: string;
}

export interface JobResultView {
  task_id: string;
  status: JobStatus;
  result?: CanonicalResult;
  error?: string;
}

export interface JobOrchestratorOptions {
  defaultModel: string;
}

function isSortableField(field: string): field is SortableJobField {
  return SORTABLE_JOB_FIELDS.some(candidate => candidate === field);
}

/** `field` or `-field` (descending). */
export function parseOrdering(ordering: string = DEFAULT_ORDERING): JobSort {
  const descending = ordering.startsWith('-');
  const field = descending ? ordering.slice(1) : ordering;
  if (!isSortableField(field)) {
    throw new ValidationError(
      `Invalid ordering field: ${field}. Valid fields are: ${SORTABLE_JOB_FIELDS.join(', ')}`
    );
  }
  return { field, descending };
}

export class JobOrchestrator {
  constructor(
    private readonly store: JobStore,
    private readonly queue: JobQueue,
    private readonly registry: ProviderRegistry,
    private readonly executor: JobExecutor,
    private readonly options: JobOrchestratorOptions
  ) {}

  /** Validate against the provider and persist a Pending job. Nothing runs yet. */
  async createJob(request: CreateJobRequest): Promise<string> {
    const provider = request.provider ?? this.registry.defaultProvider;
    const model = request.model ?? this.options.defaultModel;
    const connector = this.registry.get(provider);
    const parameters = connector.validateParameters(model, request.parameters);

    const jobId = await this.store.insert({
      tenant_id: request.tenant_id,
      user_id: request.user_id,
      provider,
      model,
      parameters,
      is_async: request.is_async,
    });
    logger.info(`Created job ${jobId}`, { provider, model, tenant_id: request.tenant_id, is_async: request.is_async });
    return jobId;
  }

  /**
   * Queue the job, or run it inline when it was created synchronous. Inline
   * runs rethrow the provider error after it has been recorded.
   */
  async dispatch(jobId: string): Promise<void> {
    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const message = {
      job_id: job.id,
      provider: job.provider,
      model: job.model,
      parameters: job.parameters,
    };

    if (job.is_async) {
      await this.queue.enqueue(message);
      logger.info(`Queued job ${jobId} for execution`);
      return;
    }

    logger.warn(`Running job ${jobId} synchronously on the request path`);
    const inline: DispatchMessage = { ...message, enqueued_at: new Date().toISOString() };
    await this.executor.execute(inline, { propagateErrors: true });
  }

  async submit(request: CreateJobRequest): Promise<string> {
    const jobId = await this.createJob(request);
    await this.dispatch(jobId);
    return jobId;
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.requireJob(jobId);
    return {
      task_id: job.id,
      status: job.status,
      created_at: job.created_at,
      updated_at: job.updated_at,
    };
  }

  async getResult(jobId: string): Promise<JobResultView> {
    const job = await this.requireJob(jobId);
    return {
      task_id: job.id,
      status: job.status,
      result: job.result,
      error: job.error,
    };
  }

  /** False when the job is missing or already terminal. Remote work is not stopped. */
  async cancel(jobId: string): Promise<boolean> {
    const cancelled = await this.store.updateFields(
      jobId,
      { status: JobStatus.CANCELLED },
      allowedSources(JobStatus.CANCELLED)
    );
    if (cancelled) {
      logger.info(`Cancelled job ${jobId}`);
    }
    return cancelled;
  }

  async list(filter: Omit<JobFilter, 'status'>, options: ListOptions): Promise<JobListing> {
    const { page, pageSize } = options;
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page must be an integer >= 1');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new ValidationError(`page_size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    let status: JobStatus | undefined;
    if (options.status !== undefined) {
      if (!isJobStatus(options.status)) {
        throw new ValidationError(
          `Invalid status. Valid values are: ${Object.values(JobStatus).join(', ')}`
        );
      }
      status = options.status;
    }

    const sort = parseOrdering(options.ordering);
    const { items, total } = await this.store.countAndFind(
      { ...filter, status },
      sort,
      (page - 1) * pageSize,
      pageSize
    );

    return {
      items,
      total,
      page,
      page_size: pageSize,
      total_pages: total > 0 ? Math.ceil(total / pageSize) : 1,
    };
  }

  private async requireJob(jobId: string): Promise<Job> {
    const job = await this.store.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }
}
