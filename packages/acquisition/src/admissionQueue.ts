/**
 * Admission Queue
 *
 * Single control loop over a fixed pool of transfer slots.
 *
 * Features:
 * - FIFO admission in discovery order, never more than `maxConcurrent` RUNNING
 * - Per-job failure isolation
 * - Rate-limit halt: no new admissions, in-flight transfers finish on their
 *   own, whatever is still PENDING ends PAUSED
 * - Sleeps one poll interval only on ticks that made no progress
 */

import { EventEmitter } from 'node:events';
import {
  buildSummary,
  ConfigInvalidError,
  DEFAULT_POLL_INTERVAL_MS,
  TransferFailedError,
  transitionJob,
  type BatchSummary,
  type Job,
} from '@reeldrop/core';
import { createLogger, isPositiveInteger, sleep as defaultSleep } from '@reeldrop/utils';
import type { RateLimitGuard } from './rateLimitGuard.js';
import type { Supervisor, SupervisorFactory, SupervisorPoll } from './transferSupervisor.js';

export interface QueueJobEvent {
  job: Job;
  running: number;
  pending: number;
}

export interface QueueHaltEvent {
  reason: string;
  url?: string;
  running: number;
  pending: number;
}

// Events: `job:admitted`, `job:progress`, `job:done`, `job:failed` and
// `job:paused` carry a QueueJobEvent; `queue:halted` (once per run) a
// QueueHaltEvent; `queue:complete` the BatchSummary.

export interface AdmissionQueueOptions {
  guard: RateLimitGuard;
  createSupervisor: SupervisorFactory;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const log = createLogger({ component: 'admission-queue' });

export class AdmissionQueue extends EventEmitter {
  private readonly guard: RateLimitGuard;
  private readonly createSupervisor: SupervisorFactory;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  private pending: Job[] = [];
  private active: Set<Supervisor> = new Set();
  private halted = false;
  private running = false;

  constructor(options: AdmissionQueueOptions) {
    super();
    this.guard = options.guard;
    this.createSupervisor = options.createSupervisor;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Drive every PENDING job to a terminal state. Jobs that arrive already
   * terminal (filtered out before admission) are only counted in the summary.
   */
  async admit(jobs: Job[], maxConcurrent: number): Promise<BatchSummary> {
    if (!isPositiveInteger(maxConcurrent)) {
      throw new ConfigInvalidError('maxConcurrent', `must be a positive integer, got ${maxConcurrent}`);
    }
    if (this.running) {
      throw new Error('Admission queue is already running');
    }

    this.running = true;
    this.halted = false;
    this.pending = jobs.filter(job => job.status === 'PENDING');
    this.active.clear();

    log.info({ total: jobs.length, pending: this.pending.length, maxConcurrent }, 'Batch started');

    try {
      while (this.pending.length > 0 || this.active.size > 0) {
        let progressed = await this.pollActive();

        if (this.guard.isTripped()) {
          this.halt();
          if (this.active.size === 0) {
            this.pauseRemaining();
            break;
          }
        } else {
          progressed = (await this.fillSlots(maxConcurrent)) || progressed;
        }

        if (!progressed && (this.pending.length > 0 || this.active.size > 0)) {
          await this.sleep(this.pollIntervalMs);
        }
      }
    } finally {
      this.running = false;
    }

    const trip = this.guard.getTrip();
    const summary = buildSummary(jobs, trip ? { reason: trip.reason } : undefined);

    log.info({ counts: summary.counts, halted: summary.halted }, 'Batch finished');
    this.emit('queue:complete', summary);

    return summary;
  }

  /**
   * Poll every active supervisor once; returns whether any slot was released
   */
  private async pollActive(): Promise<boolean> {
    let released = false;

    for (const supervisor of [...this.active]) {
      const job = supervisor.job;
      let result: SupervisorPoll;

      try {
        result = await supervisor.poll();
      } catch (error) {
        supervisor.abort();
        result = {
          status: 'FAILED',
          bytesObserved: job.bytesObserved,
          markerPresent: false,
          error: `supervisor error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }

      if (result.bytesObserved !== job.bytesObserved) {
        job.bytesObserved = result.bytesObserved;
        this.emit('job:progress', this.jobEvent(job));
      }

      if (result.status === 'RUNNING') {
        continue;
      }

      this.active.delete(supervisor);
      released = true;

      switch (result.status) {
        case 'DONE':
          transitionJob(job, 'DONE', { reason: 'artifact complete' });
          this.emit('job:done', this.jobEvent(job));
          break;
        case 'FAILED': {
          const failure = new TransferFailedError(job.id, result.error ?? 'transfer failed', {
            bytesObserved: job.bytesObserved,
          });
          transitionJob(job, 'FAILED', { reason: failure.message, error: failure.message, outcome: 'TRANSFER_FAILED' });
          log.warn({ jobId: job.id, code: failure.code, details: failure.details }, 'Job failed');
          this.emit('job:failed', this.jobEvent(job));
          break;
        }
        case 'PAUSED':
          transitionJob(job, 'PAUSED', { reason: result.error, outcome: 'RATE_LIMITED' });
          this.emit('job:paused', this.jobEvent(job));
          break;
      }
    }

    return released;
  }

  /**
   * Admit pending jobs while slots are free; returns whether any was admitted
   */
  private async fillSlots(maxConcurrent: number): Promise<boolean> {
    let admitted = false;

    while (this.active.size < maxConcurrent && this.pending.length > 0 && !this.guard.isTripped()) {
      const job = this.pending.shift();
      if (!job) {
        break;
      }

      transitionJob(job, 'RUNNING', { reason: 'admitted' });
      const supervisor = this.createSupervisor(job);
      this.active.add(supervisor);
      admitted = true;

      try {
        await supervisor.start();
        log.info({ jobId: job.id, running: this.active.size, pending: this.pending.length }, 'Job admitted');
        this.emit('job:admitted', this.jobEvent(job));
      } catch (error) {
        supervisor.abort();
        this.active.delete(supervisor);
        const message = `could not start transfer: ${error instanceof Error ? error.message : String(error)}`;
        transitionJob(job, 'FAILED', { reason: message, error: message, outcome: 'TRANSFER_FAILED' });
        log.error({ jobId: job.id, error: message }, 'Job failed to start');
        this.emit('job:failed', this.jobEvent(job));
      }
    }

    return admitted;
  }

  private halt(): void {
    if (this.halted) {
      return;
    }
    this.halted = true;

    const trip = this.guard.getTrip();
    const event: QueueHaltEvent = {
      reason: trip?.reason ?? 'rate limited',
      url: trip?.url,
      running: this.active.size,
      pending: this.pending.length,
    };

    log.warn(event, 'Admissions halted; waiting for running transfers');
    this.emit('queue:halted', event);
  }

  private pauseRemaining(): void {
    const reason = this.guard.getTrip()?.reason ?? 'rate limited';

    for (const job of this.pending) {
      transitionJob(job, 'PAUSED', { reason, outcome: 'RATE_LIMITED' });
      this.emit('job:paused', this.jobEvent(job));
    }
    this.pending = [];
  }

  private jobEvent(job: Job): QueueJobEvent {
    return {
      job,
      running: this.active.size,
      pending: this.pending.length,
    };
  }
}
