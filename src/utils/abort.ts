import { SkeinError } from './errors.js';

export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw SkeinError.interrupted();
  }
}

/**
 * Settle with `promise`, or reject with an interrupted SkeinError as soon as
 * `signal` aborts. The underlying work is not cancelled; callers stop it
 * through the same signal.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(SkeinError.interrupted());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    // Always attached, so a late rejection of the abandoned work is handled
    promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}
