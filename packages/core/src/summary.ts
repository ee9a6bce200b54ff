/**
 * Batch Summary
 */

import { toJobReport } from './job.js';
import { isTerminalStatus } from './stateMachine.js';
import type { Job, JobReport, JobStatus } from './types/job.js';

export interface BatchSummary {
  total: number;
  counts: Record<JobStatus, number>;
  jobs: JobReport[];
  /** Every SKIPPED, FAILED and PAUSED job, in batch order */
  notDone: JobReport[];
  halted: boolean;
  haltReason?: string;
}

export function emptyCounts(): Record<JobStatus, number> {
  return { PENDING: 0, RUNNING: 0, DONE: 0, FAILED: 0, PAUSED: 0, SKIPPED: 0 };
}

export function buildSummary(
  jobs: readonly Job[],
  halt?: { reason: string }
): BatchSummary {
  const counts = emptyCounts();
  const reports = jobs.map(toJobReport);

  for (const job of jobs) {
    counts[job.status]++;
  }

  return {
    total: jobs.length,
    counts,
    jobs: reports,
    notDone: reports.filter(r => isTerminalStatus(r.status) && r.status !== 'DONE'),
    halted: halt !== undefined,
    haltReason: halt?.reason,
  };
}
