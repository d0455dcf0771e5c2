/**
 * Generic retry utility with exponential backoff and optional jitter.
 *
 * @module utils/retry
 */

import { logger, errorMessage } from './logger';
import { classifyError } from '../core/errors';

export interface RetryOptions {
  /** Maximum number of retry attempts after the first call (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds before first retry (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay cap in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Add up to one base delay of random jitter (default: false) */
  jitter?: boolean;
  /** Predicate to decide if an error is retryable. Return true to retry. */
  retryOn?: (error: unknown) => boolean;
  /** Aborting stops further attempts and interrupts the backoff sleep */
  signal?: AbortSignal;
  /** Label included in retry log lines */
  label?: string;
}

/**
 * Default retry predicate: only errors classified as transient (NetworkError,
 * timeouts) are retried. Authentication, validation and remote throttling
 * fail the attempt immediately.
 */
function defaultRetryOn(error: unknown): boolean {
  return classifyError(error).retryable;
}

/**
 * Compute delay for a given attempt using exponential backoff.
 * Formula: min(baseDelay * 2^attempt (+ jitter), maxDelay)
 */
export function computeDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, jitter = false): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const extra = jitter ? Math.random() * baseDelayMs : 0;
  return Math.min(exponentialDelay + extra, maxDelayMs);
}

/**
 * Sleep for a given number of milliseconds, rejecting early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @param fn - receives the zero-based attempt number
 * @returns The result of the function call
 * @throws The last error encountered after all retries are exhausted
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxRetries = options?.maxRetries ?? 3;
  const baseDelayMs = options?.baseDelayMs ?? 1000;
  const maxDelayMs = options?.maxDelayMs ?? 30_000;
  const retryOn = options?.retryOn ?? defaultRetryOn;
  const signal = options?.signal;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries || signal?.aborted) {
        break;
      }

      if (!retryOn(error)) {
        throw error;
      }

      const delay = computeDelay(attempt, baseDelayMs, maxDelayMs, options?.jitter ?? false);

      logger.warn('Retrying after transient error', {
        label: options?.label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: errorMessage(error),
      });

      await sleep(delay, signal);
    }
  }

  throw lastError;
}
