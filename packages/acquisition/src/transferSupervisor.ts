/**
 * Transfer Supervisor
 *
 * Owns one active transfer and decides its outcome from filesystem state:
 * the transfer is complete once the partial-artifact marker is gone and the
 * final artifact exists. Byte counts only feed progress reporting and the
 * inactivity timer.
 */

import type { Job } from '@reeldrop/core';
import { createLogger, formatDuration, type Logger } from '@reeldrop/utils';
import { fsArtifactStore, type ArtifactStore } from './artifacts.js';
import type { RateLimitGuard } from './rateLimitGuard.js';
import { markerPathFor, type TransferAgent, type TransferHandle } from './transferAgent.js';

export type SupervisorStatus = 'RUNNING' | 'DONE' | 'FAILED' | 'PAUSED';

export interface SupervisorPoll {
  status: SupervisorStatus;
  bytesObserved: number;
  markerPresent: boolean;
  error?: string;
}

/**
 * What the admission queue needs from a supervisor
 */
export interface Supervisor {
  readonly job: Job;
  start(): Promise<void>;
  poll(): Promise<SupervisorPoll>;
  /** Stop the transfer; the queue calls this when it gives up on the job */
  abort(): void;
}

export type SupervisorFactory = (job: Job) => Supervisor;

export interface TransferSupervisorOptions {
  /** Time without marker growth after which the transfer counts as stalled */
  inactivityTimeoutMs: number;
  /** Clock in milliseconds; defaults to Date.now */
  now?: () => number;
  store?: ArtifactStore;
  /** Receives the restricted-access signal when a transfer lands on one */
  guard?: RateLimitGuard;
}

export class TransferSupervisor implements Supervisor {
  private readonly store: ArtifactStore;
  private readonly markerPath: string;
  private readonly log: Logger;
  private handle: TransferHandle | null = null;
  private lastActivityAt = 0;
  private bytesObserved = 0;
  private markerSeen = false;
  private outcome: SupervisorPoll | null = null;

  constructor(
    readonly job: Job,
    private readonly agent: TransferAgent,
    private readonly options: TransferSupervisorOptions
  ) {
    this.store = options.store ?? fsArtifactStore;
    this.markerPath = markerPathFor(job.targetPath, agent);
    this.log = createLogger({ component: 'transfer-supervisor', jobId: job.id });
  }

  async start(): Promise<void> {
    if (this.handle) {
      throw new Error(`Transfer already started for ${this.job.id}`);
    }

    this.handle = await this.agent.start({
      jobId: this.job.id,
      source: this.job.source,
      targetPath: this.job.targetPath,
      markerPath: this.markerPath,
    });

    this.lastActivityAt = this.now();
    this.log.info({ agent: this.agent.name, target: this.job.targetPath }, 'Transfer started');
  }

  async poll(): Promise<SupervisorPoll> {
    if (this.outcome) {
      return this.outcome;
    }
    if (!this.handle) {
      throw new Error(`Transfer not started for ${this.job.id}`);
    }

    const exitCode = this.handle.exitCode();
    const restrictedUrl = exitCode === null ? undefined : this.handle.restrictedUrl?.();

    if (restrictedUrl) {
      this.options.guard?.observe({
        restricted: true,
        url: restrictedUrl,
        reason: 'transfer redirected to a restricted page',
      });
      return this.finish('PAUSED', `redirected to restricted page ${restrictedUrl}`);
    }

    if (exitCode !== null && exitCode !== 0) {
      const detail = this.handle.diagnostic();
      const message = `${this.agent.name} exited with code ${exitCode}`;
      return this.finish('FAILED', detail ? `${message}: ${detail}` : message);
    }

    const [markerSize, finalSize] = await Promise.all([
      this.store.sizeOf(this.markerPath),
      this.store.sizeOf(this.job.targetPath),
    ]);

    if (markerSize === null && finalSize !== null) {
      this.bytesObserved = finalSize;
      return this.finish('DONE');
    }

    if (markerSize !== null) {
      if (!this.markerSeen) {
        this.markerSeen = true;
        this.log.debug('Partial artifact appeared');
      }
      if (markerSize > this.bytesObserved) {
        this.bytesObserved = markerSize;
        this.lastActivityAt = this.now();
        return this.running(true);
      }
    }

    if (this.now() - this.lastActivityAt >= this.options.inactivityTimeoutMs) {
      this.abort();
      return this.finish('FAILED', `no progress for ${formatDuration(this.options.inactivityTimeoutMs)}`);
    }

    return this.running(markerSize !== null);
  }

  abort(): void {
    this.handle?.abort?.();
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }

  private running(markerPresent: boolean): SupervisorPoll {
    return {
      status: 'RUNNING',
      bytesObserved: this.bytesObserved,
      markerPresent,
    };
  }

  private finish(status: Exclude<SupervisorStatus, 'RUNNING'>, error?: string): SupervisorPoll {
    this.outcome = {
      status,
      bytesObserved: this.bytesObserved,
      markerPresent: false,
      error,
    };

    if (status === 'DONE') {
      this.log.info({ bytes: this.bytesObserved }, 'Transfer complete');
    } else {
      this.log.warn({ status, error }, 'Transfer ended without artifact');
    }

    return this.outcome;
  }
}

/**
 * Factory binding every job to a TransferSupervisor over the same agent
 */
export function transferSupervisorFactory(
  agent: TransferAgent,
  options: TransferSupervisorOptions
): SupervisorFactory {
  return (job) => new TransferSupervisor(job, agent, options);
}
