/**
 * Abort-aware timing primitives
 *
 * Every wait in the trial engine goes through these helpers so that a single
 * AbortSignal can stop workers, the sampler and the controller's cool-down.
 */

/**
 * Wait for `ms` milliseconds.
 *
 * Resolves `true` when the full delay elapsed and `false` as soon as `signal`
 * aborts (or immediately if it is already aborted). Never rejects.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with `signal.reason` as soon as `signal` aborts.
 *
 * The underlying promise keeps running after an abort; its eventual result is
 * observed and discarded.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };

    if (signal.aborted) {
      // Already aborted: the result is discarded
      void promise.catch(() => undefined);
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
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
