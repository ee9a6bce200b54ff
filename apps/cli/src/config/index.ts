/**
 * CLI Configuration
 *
 * Environment defaults, validated with zod, merged with the flags given
 * to a command.
 */

import { z } from 'zod';
import {
  ConfigInvalidError,
  DEFAULT_INACTIVITY_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_POLL_INTERVAL_MS,
  MEDIA_EXTENSIONS,
  type BatchOptionsInput,
} from '@reeldrop/core';

// NODE_ENV and LOG_LEVEL are read by the logger; they are checked here only
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  REELDROP_TARGET_DIR: z.string().optional(),
  REELDROP_MAX_CONCURRENT: z.coerce.number().int().positive().default(DEFAULT_MAX_CONCURRENT),
  REELDROP_EXT: z.enum(MEDIA_EXTENSIONS).default('mkv'),
  REELDROP_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  REELDROP_INACTIVITY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_INACTIVITY_TIMEOUT_MS),

  REELDROP_CURL_PATH: z.string().min(1).default('curl'),
  REELDROP_RESTRICTED_PATTERNS: z
    .string()
    .default('register,premium')
    .transform(value => value.split(',').map(p => p.trim()).filter(Boolean)),
});

export interface CliConfig {
  targetDir?: string;
  maxConcurrent: number;
  extension: (typeof MEDIA_EXTENSIONS)[number];
  pollIntervalMs: number;
  inactivityTimeoutMs: number;
  curlPath: string;
  restrictedPatterns: string[];
}

function firstIssue(error: z.ZodError, fallback: string): ConfigInvalidError {
  const issue = error.issues[0];
  return new ConfigInvalidError(issue?.path.join('.') || fallback, issue?.message ?? 'invalid value');
}

/**
 * Read the configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw firstIssue(result.error, 'environment');
  }

  const parsed = result.data;
  return {
    targetDir: parsed.REELDROP_TARGET_DIR || undefined,
    maxConcurrent: parsed.REELDROP_MAX_CONCURRENT,
    extension: parsed.REELDROP_EXT,
    pollIntervalMs: parsed.REELDROP_POLL_INTERVAL_MS,
    inactivityTimeoutMs: parsed.REELDROP_INACTIVITY_TIMEOUT_MS,
    curlPath: parsed.REELDROP_CURL_PATH,
    restrictedPatterns: parsed.REELDROP_RESTRICTED_PATTERNS,
  };
}

const fetchFlagsSchema = z.object({
  target: z.string().optional(),
  ext: z.enum(MEDIA_EXTENSIONS).optional(),
  jobs: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
});

export interface FetchFlags {
  target?: string;
  ext?: string;
  jobs?: number;
  limit?: number;
}

/**
 * Batch options for `fetch`: flags win over the environment
 */
export function resolveBatchOptions(flags: FetchFlags, config: CliConfig): BatchOptionsInput {
  const result = fetchFlagsSchema.safeParse(flags);
  if (!result.success) {
    throw firstIssue(result.error, 'flags');
  }

  const parsed = result.data;
  return {
    targetDir: parsed.target ?? config.targetDir ?? '',
    maxConcurrent: parsed.jobs ?? config.maxConcurrent,
    extension: parsed.ext ?? config.extension,
    limit: parsed.limit,
    pollIntervalMs: config.pollIntervalMs,
    inactivityTimeoutMs: config.inactivityTimeoutMs,
  };
}
