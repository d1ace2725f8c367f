import { describe, expect, it } from 'vitest';

import { AuthenticationError, OverloadedError, RateLimitError } from '../provider/errors';
import { DEFAULT_RETRY_POLICY, backoffDelay } from './policy';
import { initialRetryState, isTerminal, transition, type RetryState } from './state-machine';

describe('backoffDelay', () => {
  it('should double the delay for each retry', () => {
    expect([1, 2, 3].map((n) => backoffDelay(DEFAULT_RETRY_POLICY, n))).toEqual([
      1000, 2000, 4000,
    ]);
  });
});

describe('transition', () => {
  const policy = DEFAULT_RETRY_POLICY;

  it('should succeed from attempting', () => {
    const next = transition(initialRetryState<string>(), { type: 'success', value: 'ok' }, policy);

    expect(next).toEqual({ type: 'succeeded', value: 'ok', attempts: 1 });
  });

  it('should back off after a transient failure', () => {
    const error = new RateLimitError();
    const next = transition<string>({ type: 'attempting', attempt: 2 }, { type: 'failure', error }, policy);

    expect(next).toEqual({ type: 'backoff', attempt: 2, delayMs: 2000, error });
  });

  it('should fail after a transient failure on the last allowed attempt', () => {
    const error = new OverloadedError(529);
    const next = transition<string>({ type: 'attempting', attempt: 4 }, { type: 'failure', error }, policy);

    expect(next).toEqual({ type: 'failed', kind: 'transient', error, attempts: 4 });
  });

  it('should fail immediately after a permanent failure', () => {
    const error = new AuthenticationError('bad key');
    const next = transition<string>(initialRetryState(), { type: 'failure', error }, policy);

    expect(next).toEqual({ type: 'failed', kind: 'permanent', error, attempts: 1 });
  });

  it('should start the next attempt when the backoff elapses', () => {
    const state: RetryState<string> = {
      type: 'backoff',
      attempt: 1,
      delayMs: 1000,
      error: new RateLimitError(),
    };

    expect(transition(state, { type: 'wake' }, policy)).toEqual({ type: 'attempting', attempt: 2 });
  });

  it('should end as cancelled when cancelled during backoff', () => {
    const cause = new RateLimitError();
    const next = transition<string>(
      { type: 'backoff', attempt: 2, delayMs: 2000, error: cause },
      { type: 'cancel' },
      policy
    );

    expect(next).toMatchObject({ type: 'failed', kind: 'cancelled', attempts: 2 });
    expect(next.type === 'failed' && next.error.cause).toBe(cause);
  });

  it('should count no attempt when cancelled before the first one starts', () => {
    const next = transition<string>(initialRetryState(), { type: 'cancel' }, policy);

    expect(next).toMatchObject({ type: 'failed', kind: 'cancelled', attempts: 0 });
  });

  it('should keep terminal states unchanged', () => {
    const done: RetryState<string> = { type: 'succeeded', value: 'ok', attempts: 1 };

    expect(transition(done, { type: 'failure', error: new RateLimitError() }, policy)).toBe(done);
    expect(isTerminal(done)).toBe(true);
  });
});
