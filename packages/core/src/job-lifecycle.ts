// Job lifecycle - the transition table every status write is checked against

import { JobStatus } from './types/job.js';

/**
 * Allowed source states for each target state.
 *
 * RUNNING accepts RUNNING so a job re-delivered after a worker crash can be
 * picked up again. COMPLETED and FAILED accept PENDING because the RUNNING
 * write is best-effort. Terminal states never appear as a source.
 */
export const ALLOWED_SOURCES: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  [JobStatus.PENDING]: [],
  [JobStatus.RUNNING]: [JobStatus.PENDING, JobStatus.RUNNING],
  [JobStatus.COMPLETED]: [JobStatus.PENDING, JobStatus.RUNNING],
  [JobStatus.FAILED]: [JobStatus.PENDING, JobStatus.RUNNING],
  [JobStatus.CANCELLED]: [JobStatus.PENDING, JobStatus.RUNNING],
};

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED,
];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_SOURCES[to].includes(from);
}

export function allowedSources(to: JobStatus): readonly JobStatus[] {
  return ALLOWED_SOURCES[to];
}
