/**
 * Rate Limit Guard
 * 
 * One-way circuit breaker shared by the site-facing collaborators and the
 * admission queue. The first restricted signal trips it for the rest of the
 * batch; nothing resets it.
 */

import { EventEmitter } from 'node:events';
import { RateLimitedError } from '@reeldrop/core';
import { logger } from '@reeldrop/utils';

export const DEFAULT_RESTRICTED_PATTERNS: readonly string[] = ['register', 'premium'];

export interface RateLimitSignal {
  restricted: boolean;
  url?: string;
  reason?: string;
}

export interface RateLimitTrip {
  url?: string;
  reason: string;
  trippedAt: Date;
}

/**
 * Whether a redirect target looks like the site's restricted-access page
 */
export function isRestrictedRedirect(
  url: string,
  patterns: readonly string[] = DEFAULT_RESTRICTED_PATTERNS
): boolean {
  const lower = url.toLowerCase();
  return patterns.some(pattern => pattern.length > 0 && lower.includes(pattern.toLowerCase()));
}

export class RateLimitGuard extends EventEmitter {
  private trip: RateLimitTrip | null = null;

  /**
   * Report a signal. Booleans are accepted for collaborators that only know
   * "restricted or not".
   */
  observe(signal: RateLimitSignal | boolean): void {
    const normalized: RateLimitSignal = typeof signal === 'boolean' ? { restricted: signal } : signal;

    if (!normalized.restricted || this.trip) {
      return;
    }

    this.trip = {
      url: normalized.url,
      reason: normalized.reason ?? 'restricted-access redirect',
      trippedAt: new Date(),
    };

    logger.warn({ url: this.trip.url, reason: this.trip.reason }, 'Rate limit detected, halting admissions');
    this.emit('tripped', this.trip);
  }

  isTripped(): boolean {
    return this.trip !== null;
  }

  getTrip(): RateLimitTrip | null {
    return this.trip;
  }

  toError(): RateLimitedError | null {
    return this.trip ? new RateLimitedError(this.trip.url, this.trip.reason) : null;
  }
}
