/**
 * Batch Runner
 *
 * Wires one batch together: option validation, the target directory, the
 * dedup pass, the optional limit and the admission queue.
 */

import { resolve } from 'node:path';
import {
  ConfigInvalidError,
  createJob,
  parseBatchOptions,
  transitionJob,
  type BatchOptionsInput,
  type BatchSummary,
  type Candidate,
  type Job,
} from '@reeldrop/core';
import { createLogger, ensureDir } from '@reeldrop/utils';
import { AdmissionQueue } from './admissionQueue.js';
import type { ArtifactStore } from './artifacts.js';
import { filterExisting } from './dedupFilter.js';
import { RateLimitGuard } from './rateLimitGuard.js';
import type { TransferAgent } from './transferAgent.js';
import { transferSupervisorFactory, type SupervisorFactory } from './transferSupervisor.js';

export interface RunBatchOptions extends BatchOptionsInput {
  candidates: readonly Candidate[];
  agent: TransferAgent;
  guard?: RateLimitGuard;
  store?: ArtifactStore;
  /** Replaces the default TransferSupervisor binding */
  createSupervisor?: SupervisorFactory;
  sleep?: (ms: number) => Promise<void>;
  /** Called with the queue before it starts, to subscribe to its events */
  attach?: (queue: AdmissionQueue) => void;
}

const log = createLogger({ component: 'batch' });

/**
 * Build the batch's jobs: every candidate gets a job, those already present
 * or past the limit end SKIPPED before admission.
 */
export async function prepareJobs(
  targetDir: string,
  candidates: readonly Candidate[],
  options: { limit?: number } = {}
): Promise<Job[]> {
  const dedup = await filterExisting(targetDir, candidates);
  let admissible = 0;

  return dedup.decisions.map(decision => {
    const job = createJob(decision.candidate, targetDir);

    if (decision.skipReason) {
      transitionJob(job, 'SKIPPED', { reason: decision.skipReason, outcome: 'SKIPPED_EXISTING' });
    } else if (options.limit !== undefined && admissible >= options.limit) {
      transitionJob(job, 'SKIPPED', { reason: `beyond limit of ${options.limit}`, outcome: 'OVER_LIMIT' });
    } else {
      admissible++;
    }

    return job;
  });
}

export async function runBatch(options: RunBatchOptions): Promise<BatchSummary> {
  const batch = parseBatchOptions(options);
  const targetDir = resolve(batch.targetDir);

  try {
    await ensureDir(targetDir);
  } catch (error) {
    throw new ConfigInvalidError(
      'targetDir',
      `cannot create ${targetDir}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const guard = options.guard ?? new RateLimitGuard();
  const jobs = await prepareJobs(targetDir, options.candidates, { limit: batch.limit });

  const createSupervisor = options.createSupervisor ?? transferSupervisorFactory(options.agent, {
    inactivityTimeoutMs: batch.inactivityTimeoutMs,
    store: options.store,
    guard,
  });

  const queue = new AdmissionQueue({
    guard,
    createSupervisor,
    pollIntervalMs: batch.pollIntervalMs,
    sleep: options.sleep,
  });
  options.attach?.(queue);

  log.info(
    { targetDir, candidates: options.candidates.length, maxConcurrent: batch.maxConcurrent, agent: options.agent.name },
    'Running batch'
  );

  return queue.admit(jobs, batch.maxConcurrent);
}
