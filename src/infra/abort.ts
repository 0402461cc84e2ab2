/**
 * Cancellation helpers shared by every suspending operation.
 */

import { CancelledError } from './errors.js';

/**
 * Throw CancelledError if the signal has already fired
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(describeReason(signal.reason), signal.reason);
  }
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error && reason.message) {
    return `Operation cancelled: ${reason.message}`;
  }
  return 'Operation cancelled';
}

/**
 * Delays execution for a specified number of milliseconds.
 * Rejects with CancelledError as soon as the signal fires.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(describeReason(signal.reason), signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(describeReason(signal?.reason), signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against the signal. The underlying work is not stopped;
 * operations that accept the signal themselves should be preferred.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  throwIfAborted(signal);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new CancelledError(describeReason(signal.reason), signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
