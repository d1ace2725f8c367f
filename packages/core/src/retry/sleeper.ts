/**
 * Waits for a backoff delay.
 *
 * Contract: resolves after `ms`, or as soon as `signal` aborts. Never rejects;
 * callers check `signal.aborted` afterwards.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Default sleeper backed by a timer that an abort signal cuts short.
 */
export const timerSleeper: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
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
