import type { Job, JobFilter, JobPage, JobPatch, JobSort, JobStatus, NewJob } from '../types/job.js';

/**
 * Persistence contract for job documents. Each method is atomic per job;
 * no multi-job transactions are offered.
 */
export interface JobStore {
  /** Persist a new PENDING job and return its id. */
  insert(job: NewJob): Promise<string>;

  findById(id: string): Promise<Job | null>;

  /**
   * Apply `patch` to one job. When `allowedFrom` is given the write only
   * happens if the current status is one of those states (compare-and-set).
   * Resolves false when the job is missing or the guard rejects the write;
   * rejects with StoreError when the store itself fails.
   */
  updateFields(id: string, patch: JobPatch, allowedFrom?: readonly JobStatus[]): Promise<boolean>;

  countAndFind(filter: JobFilter, sort: JobSort, skip: number, limit: number): Promise<JobPage>;
}
