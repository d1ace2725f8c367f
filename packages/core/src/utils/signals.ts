export interface CombinedSignal {
  signal: AbortSignal;
  /** Detach from the source signals. Call once the operation has settled. */
  dispose(): void;
}

/**
 * Combine multiple AbortSignals into a single signal.
 * The combined signal aborts when ANY of the source signals abort,
 * with that signal's reason.
 *
 * Long-lived sources (a process-wide shutdown signal) outlive every request,
 * so the caller must `dispose()` the combination when its request settles.
 *
 * @example
 * ```typescript
 * const combined = combineSignals(shutdown.signal, AbortSignal.timeout(60_000));
 * try {
 *   await fetch(url, { signal: combined.signal });
 * } finally {
 *   combined.dispose();
 * }
 * ```
 */
export function combineSignals(...signals: AbortSignal[]): CombinedSignal {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  const dispose = () => {
    for (const detach of detachers.splice(0)) {
      detach();
    }
  };

  for (const signal of signals) {
    if (signal.aborted) {
      dispose();
      controller.abort(signal.reason);
      return { signal: controller.signal, dispose };
    }

    const onAbort = () => {
      dispose();
      controller.abort(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => signal.removeEventListener('abort', onAbort));
  }

  return { signal: controller.signal, dispose };
}
