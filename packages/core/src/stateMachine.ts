/**
 * Job State Machine
 * 
 * Strict state machine for job lifecycle management.
 * 
 * State Flow:
 * PENDING → RUNNING → DONE | FAILED | PAUSED
 *        ↘ PAUSED  (rate limit tripped before admission)
 *        ↘ SKIPPED (filtered before admission)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is recorded on the job
 */

import { StateTransitionError } from './errors/index.js';
import type { Job, JobOutcome, JobStateTransition, JobStatus, TerminalStatus } from './types/job.js';

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobStatus, ReadonlySet<JobStatus>> = {
  PENDING: new Set<JobStatus>([
    'RUNNING',
    'PAUSED',
    'SKIPPED',
  ]),
  RUNNING: new Set<JobStatus>([
    'DONE',
    'FAILED',
    'PAUSED',
  ]),
  DONE: new Set<JobStatus>([]),
  FAILED: new Set<JobStatus>([]),
  PAUSED: new Set<JobStatus>([]),
  SKIPPED: new Set<JobStatus>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobStatus, to: JobStatus): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobStatus): JobStatus[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalStatus(status: JobStatus): status is TerminalStatus {
  return validTransitions[status].size === 0;
}

export interface TransitionDetails {
  reason?: string;
  outcome?: JobOutcome;
  error?: string;
}

/**
 * Drives one job through its lifecycle.
 * Throws StateTransitionError if a transition is invalid.
 */
export class JobStateMachine {
  constructor(private readonly job: Job) {}

  canTransitionTo(targetState: JobStatus): boolean {
    return isValidTransition(this.job.status, targetState);
  }

  transitionTo(targetState: JobStatus, details: TransitionDetails = {}): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.job.id, this.job.status, targetState);
    }

    const transition: JobStateTransition = {
      from: this.job.status,
      to: targetState,
      timestamp: new Date(),
      reason: details.reason,
    };

    this.job.history.push(transition);
    this.job.status = targetState;
    if (details.outcome) {
      this.job.outcome = details.outcome;
    }
    if (details.error) {
      this.job.error = details.error;
    }

    return transition;
  }
}

/**
 * Shorthand for a single validated transition
 */
export function transitionJob(
  job: Job,
  targetState: JobStatus,
  details?: TransitionDetails
): JobStateTransition {
  return new JobStateMachine(job).transitionTo(targetState, details);
}
