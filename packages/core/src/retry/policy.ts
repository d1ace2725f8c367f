export interface RetryPolicy {
  /** Additional attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
}

/** 3 retries, waiting 1s, 2s, then 4s. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  backoffFactor: 2,
};

/**
 * Delay before the given retry (1-based). No jitter: the schedule is exact.
 */
export function backoffDelay(policy: RetryPolicy, retryNumber: number): number {
  return policy.baseDelayMs * policy.backoffFactor ** (retryNumber - 1);
}
