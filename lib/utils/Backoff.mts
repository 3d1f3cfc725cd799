/**
 * Backoff and timing helpers shared by the sessions and supervisors
 */

export interface BackoffPolicy {
  /** Delay before the first retry */
  baseDelay: number;
  /** Upper bound for any single delay */
  maxDelay: number;
}

/**
 * Exponential delay for the given consecutive-failure count, capped, with
 * equal jitter: half of the delay is fixed, the other half random.
 *
 * @param failures - consecutive failures so far (1 for the first retry)
 * @param random - source in [0, 1)
 */
export function computeBackoffDelay(
  failures: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, failures - 1);
  const capped = Math.min(policy.maxDelay, policy.baseDelay * Math.pow(2, exponent));
  const half = capped / 2;
  return Math.round(half + random() * half);
}

/**
 * Sleep that ends early, without error, when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a timer; the timer rejects with the error built by
 * onTimeout, an abort of the signal with its reason. The original promise
 * is left running.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const abortError = () =>
      signal?.reason instanceof Error ? signal.reason : new Error('Operation aborted');
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const settle = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(onTimeout());
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      }
    );
  });
}
