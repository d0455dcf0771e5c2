/**
 * Integration error taxonomy.
 *
 * Every failure an adapter call can produce is normalised into one of these
 * classes so the orchestrator can decide on retries, breaker accounting and
 * how the outcome is reported in a SyncLog.
 *
 * @module core/errors
 */

export const INTEGRATION_ERROR_KINDS = [
  'authentication',
  'network',
  'rate_limited',
  'circuit_open',
  'validation',
  'duplicate',
  'not_found',
  'unknown',
] as const;

export type IntegrationErrorKind = (typeof INTEGRATION_ERROR_KINDS)[number];

export interface IntegrationErrorOptions {
  cause?: unknown;
  details?: unknown;
}

export abstract class IntegrationError extends Error {
  abstract readonly kind: IntegrationErrorKind;
  readonly details?: unknown;

  constructor(message: string, options?: IntegrationErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options?.details;
  }

  /** Whether the same call may succeed if attempted again within this cycle. */
  get retryable(): boolean {
    return false;
  }

  toJSON(): { kind: IntegrationErrorKind; message: string; details?: unknown } {
    return this.details === undefined
      ? { kind: this.kind, message: this.message }
      : { kind: this.kind, message: this.message, details: this.details };
  }
}

/** Bad or expired credentials. Never retried within a cycle. */
export class AuthenticationError extends IntegrationError {
  readonly kind = 'authentication' as const;
}

/** Connectivity failure, 5xx or timeout. Retried within the adapter's budget. */
export class NetworkError extends IntegrationError {
  readonly kind = 'network' as const;
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(message: string, options?: IntegrationErrorOptions & { status?: number; timedOut?: boolean }) {
    super(message, options);
    this.status = options?.status;
    this.timedOut = options?.timedOut ?? false;
  }

  override get retryable(): boolean {
    return true;
  }
}

/** The remote API throttled us (e.g. HTTP 429). Distinct from the local limiter. */
export class RateLimitedError extends IntegrationError {
  readonly kind = 'rate_limited' as const;
  readonly retryAfterMs?: number;

  constructor(message: string, options?: IntegrationErrorOptions & { retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** The local circuit breaker rejected the call; it was never attempted. */
export class CircuitOpenError extends IntegrationError {
  readonly kind = 'circuit_open' as const;

  constructor(name: string) {
    super(`Circuit breaker '${name}' is OPEN: requests are being rejected`);
  }
}

/** Malformed payload, either from the caller or rejected by the remote API. */
export class ValidationError extends IntegrationError {
  readonly kind = 'validation' as const;
}

export class DuplicateIntegrationError extends IntegrationError {
  readonly kind = 'duplicate' as const;
}

export class IntegrationNotFoundError extends IntegrationError {
  readonly kind = 'not_found' as const;
}

/** Catch-all for anything an adapter throws that is not part of the taxonomy. */
export class UnknownError extends IntegrationError {
  readonly kind = 'unknown' as const;
}

/**
 * Normalise any thrown value into an IntegrationError.
 * Abort/timeout errors raised by fetch or AbortSignal.timeout become NetworkError.
 */
export function classifyError(error: unknown): IntegrationError {
  if (error instanceof IntegrationError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return new NetworkError(error.message || 'Request timed out', { cause: error, timedOut: true });
    }
    if (error.name === 'AbortError') {
      return new NetworkError(error.message || 'Request aborted', { cause: error });
    }
    return new UnknownError(error.message, { cause: error });
  }

  return new UnknownError(String(error));
}
