// Job types - the persisted generation request and its lifecycle

import type { CanonicalResult, JobParameters } from './connector.js';

export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

// Owner recorded for jobs created with tenant/system level credentials
export const SYSTEM_USER_ID = 'system';

export interface Job {
  id: string;
  tenant_id: string;
  user_id: string;
  provider: string;
  model: string;
  parameters: JobParameters;
  is_async: boolean;
  status: JobStatus;
  created_at: string; // ISO-8601
  updated_at: string; // ISO-8601, strictly increasing per write
  result?: CanonicalResult; // present iff COMPLETED
  error?: string; // present iff FAILED
}

export type NewJob = Pick<
  Job,
  'tenant_id' | 'user_id' | 'provider' | 'model' | 'parameters' | 'is_async'
>;

export interface JobPatch {
  status?: JobStatus;
  result?: CanonicalResult;
  error?: string;
}

export interface JobFilter {
  tenant_id: string;
  user_id?: string; // omitted = tenant-wide
  status?: JobStatus;
  model?: string;
}

export const SORTABLE_JOB_FIELDS = ['created_at', 'updated_at', 'status', 'model', 'provider'] as const;
export type SortableJobField = (typeof SORTABLE_JOB_FIELDS)[number];

export interface JobSort {
  field: SortableJobField;
  descending: boolean;
}

export interface JobPage {
  items: Job[];
  total: number;
}

// What a worker receives from the dispatch queue
export interface DispatchMessage {
  job_id: string;
  provider: string;
  model: string;
  parameters: JobParameters;
  enqueued_at: string;
}

export function isJobStatus(value: string): value is JobStatus {
  return Object.values(JobStatus).some(status => status === value);
}
