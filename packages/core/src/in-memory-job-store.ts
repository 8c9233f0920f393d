// In-memory Job Store - same contract as the Redis store, for tests and local tooling

import { v4 as uuidv4 } from 'uuid';
import type { JobStore } from './interfaces/job-store.js';
import { Job, JobFilter, JobPage, JobPatch, JobSort, JobStatus, NewJob } from './types/job.js';

interface StoredJob {
  job: Job;
  updatedMs: number;
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, StoredJob>();

  constructor(private readonly now: () => number = Date.now) {}

  async insert(newJob: NewJob): Promise<string> {
    const id = uuidv4();
    const createdMs = this.now();
    const stamp = new Date(createdMs).toISOString();
    this.jobs.set(id, {
      job: {
        ...structuredClone(newJob),
        id,
        status: JobStatus.PENDING,
        created_at: stamp,
        updated_at: stamp,
      },
      updatedMs: createdMs,
    });
    return id;
  }

  async findById(id: string): Promise<Job | null> {
    const stored = this.jobs.get(id);
    return stored ? structuredClone(stored.job) : null;
  }

  async updateFields(
    id: string,
    patch: JobPatch,
    allowedFrom?: readonly JobStatus[]
  ): Promise<boolean> {
    const stored = this.jobs.get(id);
    if (!stored) return false;
    if (allowedFrom && !allowedFrom.includes(stored.job.status)) return false;

    const updatedMs = Math.max(this.now(), stored.updatedMs + 1);
    const job: Job = { ...stored.job, updated_at: new Date(updatedMs).toISOString() };
    if (patch.status !== undefined) job.status = patch.status;
    if (patch.result !== undefined) job.result = structuredClone(patch.result);
    if (patch.error !== undefined) job.error = patch.error;
    this.jobs.set(id, { job, updatedMs });
    return true;
  }

  async countAndFind(filter: JobFilter, sort: JobSort, skip: number, limit: number): Promise<JobPage> {
    const direction = sort.descending ? -1 : 1;
    const matching = [...this.jobs.values()]
      .map(stored => stored.job)
      .filter(
        job =>
          job.tenant_id === filter.tenant_id &&
          (filter.user_id === undefined || job.user_id === filter.user_id) &&
          (filter.status === undefined || job.status === filter.status) &&
          (filter.model === undefined || job.model === filter.model)
      )
      .sort((a, b) => {
        const left = a[sort.field];
        const right = b[sort.field];
        if (left === right) return a.id < b.id ? -direction : direction;
        return left < right ? -direction : direction;
      });

    return {
      items: matching.slice(skip, skip + limit).map(job => structuredClone(job)),
      total: matching.length,
    };
  }
}
