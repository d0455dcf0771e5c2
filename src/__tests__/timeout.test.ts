import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { withTimeout } from '../utils/timeout';
import { AsyncLock, linkAbortSignal } from '../utils/async-lock';
import { NetworkError } from '../core/errors';

describe('withTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the task result inside the deadline', async () => {
    await expect(withTimeout(async () => 42, 100)).resolves.toBe(42);
  });

  it('rejects with a timed-out NetworkError even if the task ignores its signal', async () => {
    const pending = withTimeout(() => new Promise<never>(() => undefined), 100, { label: 'fetchProducts' });
    const assertion = expect(pending).rejects.toMatchObject({
      name: 'NetworkError',
      message: 'fetchProducts timed out after 100ms',
      timedOut: true,
    });

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('aborts the signal handed to the task on timeout', async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout((signal) => {
      seen = signal;
      return new Promise<never>(() => undefined);
    }, 50);
    const assertion = expect(pending).rejects.toBeInstanceOf(NetworkError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it('rejects with the parent reason when the parent aborts first', async () => {
    const parent = new AbortController();
    const reason = new Error('run cancelled');
    const pending = withTimeout(() => new Promise<never>(() => undefined), 1000, { signal: parent.signal });
    const assertion = expect(pending).rejects.toBe(reason);

    parent.abort(reason);
    await assertion;
  });

  it('rejects straight away when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort(new Error('too late'));
    const task = vi.fn(async () => 'never');

    await expect(withTimeout(task, 1000, { signal: parent.signal })).rejects.toThrow('too late');
    expect(task).not.toHaveBeenCalled();
  });

  it('propagates task errors unchanged', async () => {
    const error = new Error('boom');
    await expect(withTimeout(() => Promise.reject(error), 1000)).rejects.toBe(error);
  });
});

describe('linkAbortSignal', () => {
  it('forwards parent aborts to the child until disposed', () => {
    const parent = new AbortController();
    const first = linkAbortSignal(parent.signal);
    const second = linkAbortSignal(parent.signal);
    second.dispose();

    parent.abort(new Error('stop'));

    expect(first.controller.signal.aborted).toBe(true);
    expect(second.controller.signal.aborted).toBe(false);
  });

  it('child aborts do not reach the parent', () => {
    const parent = new AbortController();
    const { controller } = linkAbortSignal(parent.signal);
    controller.abort();
    expect(parent.signal.aborted).toBe(false);
  });
});

describe('AsyncLock', () => {
  it('runs tasks one at a time in submission order', async () => {
    const lock = new AsyncLock();
    const order: string[] = [];
    const task = (name: string, delay: number) => () =>
      new Promise<string>((resolve) => {
        order.push(`start:${name}`);
        setTimeout(() => {
          order.push(`end:${name}`);
          resolve(name);
        }, delay);
      });

    const a = lock.run(task('a', 20));
    const b = lock.run(task('b', 1));

    await expect(Promise.all([a, b])).resolves.toEqual(['a', 'b']);
    expect(order).toEqual(['start:a', 'end:a', 'start:b', 'end:b']);
  });

  it('a rejected task does not block later ones', async () => {
    const lock = new AsyncLock();
    await expect(lock.run(() => Promise.reject(new Error('first')))).rejects.toThrow('first');
    await expect(lock.run(async () => 'second')).resolves.toBe('second');
  });
});
