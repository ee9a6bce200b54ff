/**
 * @reeldrop/core
 * 
 * Core business logic package containing:
 * - Job model and state machine
 * - Error taxonomy
 * - Batch options and summary
 */

// State machine
export {
  JobStateMachine,
  isValidTransition,
  getNextStates,
  isTerminalStatus,
  transitionJob,
  type TransitionDetails,
} from './stateMachine.js';

// Types
export {
  JOB_STATUSES,
  MEDIA_EXTENSIONS,
  type Candidate,
  type Job,
  type JobOutcome,
  type JobReport,
  type JobStateTransition,
  type JobStatus,
  type MediaExtension,
  type TerminalStatus,
} from './types/job.js';

// Jobs and summaries
export { createJob, jobIdFromFilename, toJobReport } from './job.js';
export { buildSummary, emptyCounts, type BatchSummary } from './summary.js';

// Batch options
export {
  batchOptionsSchema,
  parseBatchOptions,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_INACTIVITY_TIMEOUT_MS,
  type BatchOptions,
  type BatchOptionsInput,
} from './config/batch.js';

// Errors
export {
  ReeldropError,
  ConfigInvalidError,
  TransferFailedError,
  RateLimitedError,
  StateTransitionError,
  CommandExecutionError,
} from './errors/index.js';
