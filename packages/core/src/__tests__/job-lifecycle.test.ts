import { describe, it, expect } from 'vitest';
import { JobStatus } from '../types/job.js';
import { canTransition, isTerminal, allowedSources } from '../job-lifecycle.js';

describe('job lifecycle', () => {
  const all = Object.values(JobStatus);

  it('should allow the forward path pending -> running -> completed|failed', () => {
    expect(canTransition(JobStatus.PENDING, JobStatus.RUNNING)).toBe(true);
    expect(canTransition(JobStatus.RUNNING, JobStatus.COMPLETED)).toBe(true);
    expect(canTransition(JobStatus.RUNNING, JobStatus.FAILED)).toBe(true);
  });

  it('should allow cancellation only from pending or running', () => {
    const sources = all.filter(status => canTransition(status, JobStatus.CANCELLED));
    expect(sources).toEqual([JobStatus.PENDING, JobStatus.RUNNING]);
  });

  it('should never leave a terminal state', () => {
    for (const from of all.filter(isTerminal)) {
      for (const to of all) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
  });

  it('should never transition back to pending', () => {
    expect(allowedSources(JobStatus.PENDING)).toEqual([]);
  });

  it('should treat completed, failed and cancelled as terminal', () => {
    expect(all.filter(isTerminal)).toEqual([
      JobStatus.COMPLETED,
      JobStatus.FAILED,
      JobStatus.CANCELLED,
    ]);
  });
});
