/**
 * Custom Error Classes
 */

import type { JobStatus } from '../types/job.js';

/**
 * Base error class for all reeldrop errors
 */
export class ReeldropError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReeldropError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid batch configuration; raised before any job starts
 */
export class ConfigInvalidError extends ReeldropError {
  constructor(field: string, message: string) {
    super(
      `Invalid configuration for ${field}: ${message}`,
      'CONFIG_INVALID',
      { field, message }
    );
    this.name = 'ConfigInvalidError';
  }
}

/**
 * A single transfer failed; recorded on its job, the batch continues
 */
export class TransferFailedError extends ReeldropError {
  constructor(jobId: string, reason: string, details?: Record<string, unknown>) {
    super(reason, 'TRANSFER_FAILED', { jobId, ...details });
    this.name = 'TransferFailedError';
  }
}

/**
 * The site signalled a rate limit; admission halts for the whole batch
 */
export class RateLimitedError extends ReeldropError {
  constructor(url: string | undefined, reason: string) {
    super(
      url ? `Rate limited (${reason}): ${url}` : `Rate limited (${reason})`,
      'RATE_LIMITED',
      { url, reason }
    );
    this.name = 'RateLimitedError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends ReeldropError {
  constructor(
    jobId: string,
    fromState: JobStatus,
    toState: JobStatus,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends ReeldropError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}
