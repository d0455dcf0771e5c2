/**
 * Sliding-window rate limiter
 *
 * Holds the timestamps of admitted requests inside a trailing window and
 * refuses any request that would push the count past the ceiling. Refused
 * requests are not queued and leave no trace in the window.
 *
 * @module rate-limiter
 */

import { logger } from '../utils/logger';

export interface SlidingWindowOptions {
  /** Identifying name (used in logs) */
  name: string;
  /** Maximum admitted requests inside the window */
  maxRequests: number;
  /** Window length in ms (default: 1 hour) */
  windowMs?: number;
}

export interface RateLimiterStatus {
  maxRequests: number;
  windowMs: number;
  used: number;
  remaining: number;
  /** When the oldest admitted request leaves the window, or null if the window is empty */
  resetAt: number | null;
}

export class SlidingWindowRateLimiter {
  private readonly name: string;
  private readonly maxRequests: number;
  private readonly windowMs: number;
  // Ascending; oldest first
  private timestamps: number[] = [];

  constructor(options: SlidingWindowOptions) {
    this.name = options.name;
    this.maxRequests = Math.max(0, options.maxRequests);
    this.windowMs = options.windowMs ?? 60 * 60 * 1000;
  }

  /**
   * Admit the request and record it, or refuse it without recording anything.
   */
  isAllowed(): boolean {
    const now = Date.now();
    this.prune(now);

    if (this.timestamps.length < this.maxRequests) {
      this.timestamps.push(now);
      return true;
    }

    logger.debug('RateLimiter: request refused', {
      limiter: this.name,
      used: this.timestamps.length,
      maxRequests: this.maxRequests,
    });
    return false;
  }

  getRemainingRequests(): number {
    this.prune(Date.now());
    return Math.max(0, this.maxRequests - this.timestamps.length);
  }

  getStatus(): RateLimiterStatus {
    this.prune(Date.now());
    const oldest = this.timestamps[0];
    return {
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
      used: this.timestamps.length,
      remaining: Math.max(0, this.maxRequests - this.timestamps.length),
      resetAt: oldest === undefined ? null : oldest + this.windowMs,
    };
  }

  reset(): void {
    this.timestamps = [];
    logger.info('RateLimiter: reset', { limiter: this.name });
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.timestamps.length && this.timestamps[drop] <= cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.timestamps.splice(0, drop);
    }
  }
}
