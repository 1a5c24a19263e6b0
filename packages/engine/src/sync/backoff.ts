export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  staleAfterFailures: number;
}

/**
 * Delay before the next attempt after `failureCount` consecutive failures:
 * base * 2^(n-1), capped at the maximum.
 */
export function backoffDelayMs(failureCount: number, policy: RetryPolicy): number {
  if (failureCount <= 0) {
    return 0;
  }
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (failureCount - 1));
}
