/**
 * Bound an abortable task by a deadline.
 *
 * @module utils/timeout
 */

import { NetworkError } from '../core/errors';
import { linkAbortSignal } from './async-lock';

export interface TimeoutOptions {
  /** Parent cancellation; aborting it rejects with the parent's reason */
  signal?: AbortSignal;
  /** Used in the timeout error message */
  label?: string;
}

/**
 * Run `task` with a signal that aborts after `timeoutMs` or when the parent
 * aborts, whichever comes first. The returned promise settles on abort even if
 * the task ignores its signal; a late result from such a task is discarded.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions = {}
): Promise<T> {
  const { controller, dispose } = linkAbortSignal(options.signal);
  const label = options.label ?? 'operation';

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort(new NetworkError(`${label} timed out after ${timeoutMs}ms`, { timedOut: true }));
    }, timeoutMs);

    const cleanup = (): void => {
      clearTimeout(timer);
      controller.signal.removeEventListener('abort', onAbort);
      dispose();
    };

    const onAbort = (): void => {
      cleanup();
      reject(controller.signal.reason);
    };

    if (controller.signal.aborted) {
      onAbort();
      return;
    }
    controller.signal.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
  });
}
