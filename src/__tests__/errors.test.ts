import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  CircuitOpenError,
  DuplicateIntegrationError,
  IntegrationError,
  IntegrationNotFoundError,
  NetworkError,
  RateLimitedError,
  UnknownError,
  ValidationError,
  classifyError,
} from '../core/errors';

describe('integration error taxonomy', () => {
  it.each([
    [new AuthenticationError('x'), 'authentication', false],
    [new NetworkError('x'), 'network', true],
    [new RateLimitedError('x'), 'rate_limited', false],
    [new CircuitOpenError('x'), 'circuit_open', false],
    [new ValidationError('x'), 'validation', false],
    [new DuplicateIntegrationError('x'), 'duplicate', false],
    [new IntegrationNotFoundError('x'), 'not_found', false],
    [new UnknownError('x'), 'unknown', false],
  ])('%s has kind %s and retryable=%s', (error, kind, retryable) => {
    expect(error).toBeInstanceOf(IntegrationError);
    expect(error.kind).toBe(kind);
    expect(error.retryable).toBe(retryable);
  });

  it('sets name from the concrete class', () => {
    expect(new ValidationError('bad').name).toBe('ValidationError');
  });

  it('serialises details only when present', () => {
    expect(new ValidationError('bad').toJSON()).toEqual({ kind: 'validation', message: 'bad' });
    expect(new ValidationError('bad', { details: { field: 'price' } }).toJSON()).toEqual({
      kind: 'validation',
      message: 'bad',
      details: { field: 'price' },
    });
  });

  it('keeps status, timeout and retry-after metadata', () => {
    const network = new NetworkError('502', { status: 502 });
    expect(network.status).toBe(502);
    expect(network.timedOut).toBe(false);
    expect(new RateLimitedError('429', { retryAfterMs: 3000 }).retryAfterMs).toBe(3000);
  });
});

describe('classifyError', () => {
  it('passes integration errors through', () => {
    const error = new AuthenticationError('bad key');
    expect(classifyError(error)).toBe(error);
  });

  it('maps timeouts to a timed-out NetworkError', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';

    const classified = classifyError(timeout);

    expect(classified).toBeInstanceOf(NetworkError);
    expect(classified.message).toBe('The operation was aborted due to timeout');
    expect(classified instanceof NetworkError && classified.timedOut).toBe(true);
    expect(classified.cause).toBe(timeout);
  });

  it('maps aborts to NetworkError', () => {
    const abort = new Error('');
    abort.name = 'AbortError';
    const classified = classifyError(abort);
    expect(classified).toBeInstanceOf(NetworkError);
    expect(classified.message).toBe('Request aborted');
  });

  it('wraps anything else as UnknownError', () => {
    expect(classifyError(new TypeError('undefined is not a function'))).toBeInstanceOf(UnknownError);
    expect(classifyError('plain string').message).toBe('plain string');
  });
});
