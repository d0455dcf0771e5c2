import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CircuitBreaker, CircuitState, CircuitOpenError } from '../utils/circuit-breaker';

// Mock the logger to avoid noise in test output
vi.mock('../utils/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../utils/logger')>()),
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;
  let onTrip: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    onTrip = vi.fn();
    breaker = new CircuitBreaker({ name: 'test', failureThreshold: 3, coolDownMs: 1000, onTrip });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('passes through calls in CLOSED state', async () => {
    const fn = vi.fn().mockResolvedValue('hello');

    const result = await breaker.execute(fn);

    expect(result).toBe('hello');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('stays CLOSED when failures are below threshold', () => {
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getFailureCount()).toBe(2);
    expect(onTrip).not.toHaveBeenCalled();
  });

  it('opens on the threshold-th consecutive failure and fires onTrip once', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(onTrip).toHaveBeenCalledTimes(1);
    expect(onTrip).toHaveBeenCalledWith('test');
    expect(breaker.getSnapshot()).toEqual({
      state: CircuitState.OPEN,
      failureCount: 3,
      lastFailureTime: Date.parse('2026-01-01T00:00:00Z'),
      nextAttemptTime: Date.parse('2026-01-01T00:00:01Z'),
      trips: 1,
    });
  });

  it('a success resets the consecutive failure count', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.getFailureCount()).toBe(1);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('refuses requests while OPEN and before the cool-down elapses', async () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();

    vi.advanceTimersByTime(999);
    expect(breaker.shouldAllowRequest()).toBe(false);

    const fn = vi.fn().mockResolvedValue('never');
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('admits exactly one trial call after the cool-down', () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();
    vi.advanceTimersByTime(1000);

    expect(breaker.shouldAllowRequest()).toBe(true);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    expect(breaker.shouldAllowRequest()).toBe(false);
    expect(breaker.shouldAllowRequest()).toBe(false);
  });

  it('closes when the half-open trial succeeds', () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();
    vi.advanceTimersByTime(1000);
    breaker.shouldAllowRequest();

    breaker.recordSuccess();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getFailureCount()).toBe(0);
    expect(breaker.shouldAllowRequest()).toBe(true);
  });

  it('re-opens when the half-open trial fails and restarts the cool-down', () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();
    vi.advanceTimersByTime(1000);
    breaker.shouldAllowRequest();

    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getSnapshot().nextAttemptTime).toBe(Date.now() + 1000);
    expect(breaker.getSnapshot().trips).toBe(2);
    expect(onTrip).toHaveBeenCalledTimes(2);
    expect(breaker.shouldAllowRequest()).toBe(false);
  });

  it('releaseTrial hands the half-open trial to the next caller', () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();
    vi.advanceTimersByTime(1000);
    expect(breaker.shouldAllowRequest()).toBe(true);
    expect(breaker.shouldAllowRequest()).toBe(false);

    breaker.releaseTrial();

    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    expect(breaker.shouldAllowRequest()).toBe(true);
  });

  it('releaseTrial is a no-op outside HALF_OPEN', () => {
    breaker.releaseTrial();
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.shouldAllowRequest()).toBe(true);
  });

  it('failures recorded while already OPEN do not count as a new trip', () => {
    for (let i = 0; i < 4; i++) breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getSnapshot().trips).toBe(1);
    expect(onTrip).toHaveBeenCalledTimes(1);
  });

  it('reset() returns to CLOSED from OPEN', () => {
    for (let i = 0; i < 3; i++) breaker.recordFailure();

    breaker.reset();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getSnapshot()).toMatchObject({ failureCount: 0, lastFailureTime: null, nextAttemptTime: null });
  });

  it('execute records failures and rethrows the original error', async () => {
    const error = new Error('boom');
    await expect(breaker.execute(() => Promise.reject(error))).rejects.toBe(error);
    expect(breaker.getFailureCount()).toBe(1);
  });

  it('clamps a threshold below 1 to 1', () => {
    const eager = new CircuitBreaker({ name: 'eager', failureThreshold: 0 });
    eager.recordFailure();
    expect(eager.getState()).toBe(CircuitState.OPEN);
  });

  it('names the breaker in the CircuitOpenError message', () => {
    expect(new CircuitOpenError('trendyol:abc').message).toBe(
      "Circuit breaker 'trendyol:abc' is OPEN: requests are being rejected"
    );
  });
});
