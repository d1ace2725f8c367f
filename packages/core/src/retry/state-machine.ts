/**
 * Retry control flow as an explicit state machine.
 *
 * `transition` is pure, so the policy can be tested state by state; the
 * driver in `run.ts` performs the side effects each state asks for.
 *
 * @module retry/state-machine
 */

import type { FailureKind, ProviderError } from '../errors';
import { backoffDelay, type RetryPolicy } from './policy';
import { CancelledError } from '../provider/errors';

export type RetryState<T> =
  | { type: 'attempting'; attempt: number }
  | { type: 'backoff'; attempt: number; delayMs: number; error: ProviderError }
  | { type: 'succeeded'; value: T; attempts: number }
  | { type: 'failed'; kind: FailureKind; error: ProviderError; attempts: number };

export type TerminalRetryState<T> = Extract<RetryState<T>, { type: 'succeeded' | 'failed' }>;

export type RetryEvent<T> =
  /** The attempt resolved */
  | { type: 'success'; value: T }
  /** The attempt rejected with a classified error */
  | { type: 'failure'; error: ProviderError }
  /** The backoff delay elapsed */
  | { type: 'wake' }
  /** The caller aborted while no attempt was in flight */
  | { type: 'cancel' };

export function initialRetryState<T>(): RetryState<T> {
  return { type: 'attempting', attempt: 1 };
}

export function isTerminal<T>(state: RetryState<T>): state is TerminalRetryState<T> {
  return state.type === 'succeeded' || state.type === 'failed';
}

function cancelled<T>(attempts: number, cause?: Error): RetryState<T> {
  return {
    type: 'failed',
    kind: 'cancelled',
    error: new CancelledError({ cause, context: { attempts } }),
    attempts,
  };
}

type AttemptingState<T> = Extract<RetryState<T>, { type: 'attempting' }>;
type BackoffState<T> = Extract<RetryState<T>, { type: 'backoff' }>;

function fromAttempting<T>(
  state: AttemptingState<T>,
  event: RetryEvent<T>,
  policy: RetryPolicy
): RetryState<T> {
  switch (event.type) {
    case 'success':
      return { type: 'succeeded', value: event.value, attempts: state.attempt };
    case 'failure': {
      const kind = event.error.kind;
      if (kind === 'transient' && state.attempt <= policy.maxRetries) {
        return {
          type: 'backoff',
          attempt: state.attempt,
          delayMs: backoffDelay(policy, state.attempt),
          error: event.error,
        };
      }
      return { type: 'failed', kind, error: event.error, attempts: state.attempt };
    }
    case 'cancel':
      // the attempt never started
      return cancelled(state.attempt - 1);
    default:
      return state;
  }
}

function fromBackoff<T>(state: BackoffState<T>, event: RetryEvent<T>): RetryState<T> {
  switch (event.type) {
    case 'wake':
      return { type: 'attempting', attempt: state.attempt + 1 };
    case 'cancel':
      return cancelled(state.attempt, state.error);
    default:
      return state;
  }
}

/**
 * Compute the next state. Terminal states absorb every event.
 *
 * Attempt numbers are 1-based. A transient failure on attempt `n` backs off
 * while `n <= maxRetries`; anything else ends the sequence.
 */
export function transition<T>(
  state: RetryState<T>,
  event: RetryEvent<T>,
  policy: RetryPolicy
): RetryState<T> {
  switch (state.type) {
    case 'attempting':
      return fromAttempting(state, event, policy);
    case 'backoff':
      return fromBackoff(state, event);
    default:
      return state;
  }
}
