/**
 * Job construction
 */

import { join } from 'node:path';
import { sanitizeFilename } from '@reeldrop/utils';
import type { Candidate, Job, JobReport } from './types/job.js';

/**
 * Job identifier: the sanitized filename, lower-cased. Two candidates share
 * an id exactly when dedup treats them as the same file.
 */
export function jobIdFromFilename(filename: string): string {
  return sanitizeFilename(filename).toLowerCase();
}

/**
 * Build a PENDING job for a candidate, targeting `targetDir`
 */
export function createJob(candidate: Candidate, targetDir: string): Job {
  const filename = sanitizeFilename(candidate.filename);

  return {
    id: jobIdFromFilename(filename),
    source: candidate.source,
    filename,
    targetPath: join(targetDir, filename),
    extension: candidate.extension,
    status: 'PENDING',
    bytesObserved: 0,
    history: [],
  };
}

export function toJobReport(job: Job): JobReport {
  return {
    id: job.id,
    filename: job.filename,
    source: job.source,
    status: job.status,
    outcome: job.outcome,
    reason: job.error ?? job.history.at(-1)?.reason,
  };
}
