/**
 * Batch Options
 * 
 * zod schema for the options that shape one batch. Validation failures
 * surface as ConfigInvalidError before any job starts.
 */

import { z } from 'zod';
import { ConfigInvalidError } from '../errors/index.js';
import { MEDIA_EXTENSIONS } from '../types/job.js';

export const DEFAULT_MAX_CONCURRENT = 2;
export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_INACTIVITY_TIMEOUT_MS = 10 * 60_000;

export const batchOptionsSchema = z.object({
  targetDir: z.string().trim().min(1, 'target directory is required'),
  maxConcurrent: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT),
  extension: z.enum(MEDIA_EXTENSIONS).default('mkv'),
  limit: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  inactivityTimeoutMs: z.number().int().positive().default(DEFAULT_INACTIVITY_TIMEOUT_MS),
});

export type BatchOptionsInput = z.input<typeof batchOptionsSchema>;
export type BatchOptions = z.output<typeof batchOptionsSchema>;

/**
 * Validate batch options, throwing ConfigInvalidError on the first issue
 */
export function parseBatchOptions(input: BatchOptionsInput): BatchOptions {
  const result = batchOptionsSchema.safeParse(input);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'options';
    throw new ConfigInvalidError(field, issue?.message ?? 'invalid value');
  }

  return result.data;
}
