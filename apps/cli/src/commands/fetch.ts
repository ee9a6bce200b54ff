/**
 * Fetch Command
 * 
 * Reads a list of links, works out which ones are wanted media files and
 * downloads them into the target directory.
 */

import ora from 'ora';
import {
  CurlHeaderProbe,
  CurlTransferAgent,
  RateLimitGuard,
  discoverCandidates,
  extractUrls,
  prepareJobs,
  runBatch,
  type AdmissionQueue,
  type QueueHaltEvent,
  type QueueJobEvent,
} from '@reeldrop/acquisition';
import { ConfigInvalidError, parseBatchOptions, type BatchSummary } from '@reeldrop/core';
import { expandPath, formatBytes, formatDuration, safeReadFile } from '@reeldrop/utils';
import { loadConfig, resolveBatchOptions, type FetchFlags } from '../config/index.js';
import {
  formatStatus,
  printError,
  printHeader,
  printInfo,
  printJson,
  printKeyValue,
  printSummary,
  printTable,
  printWarning,
} from '../lib/output.js';

export interface FetchOptions extends FetchFlags {
  list: string;
  probe: boolean;
  dryRun?: boolean;
  json?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_RATE_LIMITED = 2;
export const EXIT_CONFIG_INVALID = 3;

/**
 * Warning shown once the guard trips, or null while it is closed
 */
export function rateLimitNotice(guard: RateLimitGuard): string | null {
  const error = guard.toError();
  return error ? `${error.message}; no new downloads will start` : null;
}

/**
 * Process exit code for a finished batch
 */
export function exitCodeFor(summary: BatchSummary): number {
  if (summary.halted) {
    return EXIT_RATE_LIMITED;
  }
  return summary.counts.FAILED > 0 ? EXIT_FAILURES : EXIT_OK;
}

export async function fetchCommand(options: FetchOptions): Promise<void> {
  try {
    process.exitCode = await runFetch(options);
  } catch (error) {
    if (error instanceof ConfigInvalidError) {
      printError(error.message);
      process.exitCode = EXIT_CONFIG_INVALID;
      return;
    }
    throw error;
  }
}

async function runFetch(options: FetchOptions): Promise<number> {
  const config = loadConfig();
  const batch = parseBatchOptions(resolveBatchOptions(options, config));
  const targetDir = expandPath(batch.targetDir);
  const quiet = options.json === true;

  const text = await safeReadFile(expandPath(options.list));
  if (text === null) {
    throw new ConfigInvalidError('list', `cannot read ${options.list}`);
  }

  const urls = extractUrls(text);
  const guard = new RateLimitGuard();
  if (!quiet) {
    guard.on('tripped', () => {
      const notice = rateLimitNotice(guard);
      if (notice) {
        printWarning(notice);
      }
    });
  }
  const spinner = ora({ text: `Checking ${urls.length} links...`, isSilent: quiet }).start();

  const candidates = await discoverCandidates(urls, {
    extension: batch.extension,
    probe: options.probe ? new CurlHeaderProbe(config.curlPath) : undefined,
    guard,
    restrictedPatterns: config.restrictedPatterns,
  });
  spinner.succeed(`Found ${candidates.length} .${batch.extension} files in ${urls.length} links`);

  const agent = new CurlTransferAgent({
    curlPath: config.curlPath,
    restrictedPatterns: config.restrictedPatterns,
  });

  if (options.dryRun) {
    const jobs = await prepareJobs(targetDir, candidates, { limit: batch.limit });
    if (quiet) {
      printJson(jobs.map(job => ({ id: job.id, source: job.source, status: job.status, outcome: job.outcome })));
    } else {
      printHeader('Dry Run');
      printKeyValue('Target', targetDir);
      printTable(jobs.map(job => ({ file: job.filename, status: job.status, source: job.source })));
    }
    return EXIT_OK;
  }

  if (!quiet) {
    printHeader('Downloading');
    printKeyValue('Target', targetDir);
    printKeyValue('Parallel', batch.maxConcurrent);
    console.log();
  }

  const startedAt = Date.now();
  const summary = await runBatch({
    ...batch,
    targetDir,
    candidates,
    agent,
    guard,
    attach: quiet ? undefined : reportProgress,
  });

  if (quiet) {
    printJson(summary);
  } else {
    printSummary(summary);
    printInfo(`Finished in ${formatDuration(Date.now() - startedAt)}`);
  }

  return exitCodeFor(summary);
}

function reportProgress(queue: AdmissionQueue): void {
  const line = (event: QueueJobEvent): void => {
    const bytes = event.job.bytesObserved > 0 ? ` ${formatBytes(event.job.bytesObserved)}` : '';
    console.log(`  ${formatStatus(event.job.status)} ${event.job.filename}${bytes}`);
  };

  queue.on('job:admitted', (event: QueueJobEvent) => {
    printInfo(`${event.job.filename} started (${event.running} running, ${event.pending} waiting)`);
  });
  queue.on('job:done', line);
  queue.on('job:failed', line);
  queue.on('job:paused', line);
  queue.on('queue:halted', (event: QueueHaltEvent) => {
    printInfo(`Letting ${event.running} running downloads finish, ${event.pending} left waiting`);
  });
}
