/**
 * Job Types
 */

export const JOB_STATUSES = ['PENDING', 'RUNNING', 'DONE', 'FAILED', 'PAUSED', 'SKIPPED'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalStatus = Exclude<JobStatus, 'PENDING' | 'RUNNING'>;

export const MEDIA_EXTENSIONS = ['mkv', 'mp4'] as const;

export type MediaExtension = (typeof MEDIA_EXTENSIONS)[number];

/**
 * Why a job did not end DONE. SKIPPED_EXISTING and OVER_LIMIT are
 * informational, the others mirror the error codes in ../errors.
 */
export type JobOutcome =
  | 'SKIPPED_EXISTING'
  | 'OVER_LIMIT'
  | 'TRANSFER_FAILED'
  | 'RATE_LIMITED';

export interface JobStateTransition {
  from: JobStatus;
  to: JobStatus;
  timestamp: Date;
  reason?: string;
}

/**
 * A discovered downloadable item, before admission
 */
export interface Candidate {
  source: string;
  filename: string;
  extension: MediaExtension;
}

export interface Job {
  readonly id: string;
  readonly source: string;
  readonly filename: string;
  readonly targetPath: string;
  readonly extension: MediaExtension;
  status: JobStatus;
  bytesObserved: number;
  error?: string;
  outcome?: JobOutcome;
  history: JobStateTransition[];
}

export interface JobReport {
  id: string;
  filename: string;
  source: string;
  status: JobStatus;
  outcome?: JobOutcome;
  reason?: string;
}
