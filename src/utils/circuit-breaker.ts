/**
 * Circuit Breaker for isolating an unhealthy integration.
 *
 * States:
 * - CLOSED: Normal operation, requests flow through.
 * - OPEN: Failing fast, requests are rejected until the cool-down elapses.
 * - HALF_OPEN: Exactly one trial request is let through; its outcome decides
 *   whether the circuit closes or re-opens.
 *
 * Callers either gate calls themselves (`shouldAllowRequest` followed by
 * `recordSuccess`/`recordFailure` after every attempt) or use `execute`.
 *
 * @module utils/circuit-breaker
 */

import { logger } from './logger';
import { CircuitOpenError } from '../core/errors';

export { CircuitOpenError };

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerOptions {
  /** Identifying name for this circuit breaker (used in logs) */
  name: string;
  /** Number of consecutive failures before opening the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms to wait before an OPEN circuit admits a trial call (default: 300000) */
  coolDownMs?: number;
  /** Called each time the circuit moves into OPEN from another state */
  onTrip?: (name: string) => void;
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  nextAttemptTime: number | null;
  trips: number;
}

export class CircuitBreaker {
  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly coolDownMs: number;
  private readonly onTrip?: (name: string) => void;

  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private nextAttemptTime: number | null = null;
  private trialInFlight = false;
  private trips = 0;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 5);
    this.coolDownMs = options.coolDownMs ?? 300_000;
    this.onTrip = options.onTrip;
  }

  /**
   * The sole gate consulted before calling the wrapped integration.
   * An OPEN circuit whose cool-down has elapsed moves to HALF_OPEN and admits
   * one call; later calls are refused until that trial is recorded.
   */
  shouldAllowRequest(): boolean {
    if (this.state === CircuitState.CLOSED) {
      return true;
    }

    if (this.state === CircuitState.OPEN) {
      if (this.nextAttemptTime !== null && Date.now() >= this.nextAttemptTime) {
        this.transitionTo(CircuitState.HALF_OPEN);
        this.trialInFlight = true;
        return true;
      }
      return false;
    }

    // HALF_OPEN
    if (this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  /**
   * Give back a half-open trial that was admitted but never attempted, so the
   * next caller may take it.
   */
  releaseTrial(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.trialInFlight = false;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.nextAttemptTime = null;
    this.trialInFlight = false;
    this.transitionTo(CircuitState.CLOSED);
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    this.trialInFlight = false;

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.failureThreshold) {
      this.open();
    }
  }

  /**
   * Execute a function through the circuit breaker, throwing CircuitOpenError
   * when the call is not admitted.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.shouldAllowRequest()) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  getSnapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      nextAttemptTime: this.nextAttemptTime,
      trips: this.trips,
    };
  }

  /**
   * Manually reset the circuit breaker to CLOSED state.
   */
  reset(): void {
    this.failureCount = 0;
    this.lastFailureTime = null;
    this.nextAttemptTime = null;
    this.trialInFlight = false;
    this.transitionTo(CircuitState.CLOSED);
  }

  private open(): void {
    // Re-opening restarts the cool-down clock
    this.nextAttemptTime = Date.now() + this.coolDownMs;
    const tripped = this.state !== CircuitState.OPEN;
    this.transitionTo(CircuitState.OPEN);
    if (tripped) {
      this.trips++;
      this.onTrip?.(this.name);
    }
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;

    const previousState = this.state;
    this.state = newState;

    logger.info(`Circuit breaker '${this.name}' state transition`, {
      circuitBreaker: this.name,
      from: previousState,
      to: newState,
      failureCount: this.failureCount,
    });
  }
}
