import type { ProviderError } from '../errors';
import { toError } from '../errors';
import { CancelledError, classifyProviderError } from '../provider/errors';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './policy';
import { timerSleeper, type Sleeper } from './sleeper';
import {
  initialRetryState,
  isTerminal,
  transition,
  type RetryEvent,
  type RetryState,
  type TerminalRetryState,
} from './state-machine';

export interface RetryOptions {
  policy?: RetryPolicy;
  sleeper?: Sleeper;
  signal?: AbortSignal;
  /** Called once per backoff, before sleeping */
  onRetry?: (error: ProviderError, attempt: number, delayMs: number) => void;
}

async function attemptOnce<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
  attempt: number,
  signal: AbortSignal | undefined
): Promise<RetryEvent<T>> {
  if (signal?.aborted) {
    return { type: 'cancel' };
  }
  try {
    return { type: 'success', value: await operation(attempt, signal) };
  } catch (error) {
    // an aborted request surfaces as whatever the transport throws
    const classified = signal?.aborted
      ? new CancelledError({ cause: toError(error), context: { attempt } })
      : classifyProviderError(error);
    return { type: 'failure', error: classified };
  }
}

/**
 * Drive `operation` through the retry state machine until it succeeds or fails for good.
 *
 * Never rejects for provider failures: the terminal state carries the
 * classified error and its kind. Attempts run strictly one after another.
 *
 * @example
 * ```typescript
 * const outcome = await runWithRetry((attempt, signal) => provider.complete(request, signal), {
 *   signal: controller.signal,
 * });
 * if (outcome.type === 'succeeded') {
 *   console.log(outcome.value.text, `after ${outcome.attempts - 1} retries`);
 * }
 * ```
 */
export async function runWithRetry<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
  options: RetryOptions = {}
): Promise<TerminalRetryState<T>> {
  const { policy = DEFAULT_RETRY_POLICY, sleeper = timerSleeper, signal, onRetry } = options;

  let state: RetryState<T> = initialRetryState<T>();

  while (!isTerminal(state)) {
    if (state.type === 'attempting') {
      state = transition(state, await attemptOnce(operation, state.attempt, signal), policy);
      continue;
    }

    onRetry?.(state.error, state.attempt, state.delayMs);
    await sleeper(state.delayMs, signal);
    state = transition<T>(state, signal?.aborted ? { type: 'cancel' } : { type: 'wake' }, policy);
  }

  return state;
}
