/**
 * A simple semaphore for limiting concurrent operations.
 *
 * @example
 * ```typescript
 * const semaphore = createSemaphore(3); // Allow 3 concurrent invocations
 *
 * async function invoke(request: InvocationRequest) {
 *   await semaphore.acquire();
 *   try {
 *     return await invoker.invoke(request);
 *   } finally {
 *     semaphore.release();
 *   }
 * }
 * ```
 */
export interface Semaphore {
  /**
   * Acquires a slot from the semaphore.
   * If no slots are available, waits until one is released.
   */
  acquire(): Promise<void>;

  /**
   * Releases a slot back to the semaphore.
   * Must be called after acquire() completes, typically in a finally block.
   */
  release(): void;

  /** Runs `task` while holding a slot. */
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Creates a semaphore with the specified concurrency limit.
 *
 * Waiters are served in FIFO order.
 *
 * @throws RangeError if limit is not a positive integer
 */
export function createSemaphore(limit: number): Semaphore {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
  }

  let running = 0;
  const waiting: Array<() => void> = [];

  const semaphore: Semaphore = {
    async acquire(): Promise<void> {
      if (running < limit) {
        running++;
        return;
      }
      return new Promise<void>((resolve) => {
        waiting.push(resolve);
      });
    },

    release(): void {
      running--;
      const next = waiting.shift();
      if (next) {
        running++;
        next();
      }
    },

    async run<T>(task: () => Promise<T>): Promise<T> {
      await semaphore.acquire();
      try {
        return await task();
      } finally {
        semaphore.release();
      }
    },
  };

  return semaphore;
}
