/**
 * Minimal promise-chain mutex. Tasks passed to `run` execute one at a time in
 * submission order; a rejected task does not poison the chain.
 *
 * @module utils/async-lock
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * Link an optional parent signal to a fresh controller so the child can be
 * aborted independently. The returned `dispose` detaches the listener.
 */
export function linkAbortSignal(parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}
