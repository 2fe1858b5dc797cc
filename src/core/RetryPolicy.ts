/**
 * Retry decisions and backoff for remote classification calls
 */
import type { FailureKind } from '../models/Classification';

const RETRYABLE_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'connect_timeout',
  'read_timeout',
  'timeout',
  'connect_error',
]);

/**
 * Determines if a failure kind is worth another attempt.
 * Authentication failures are terminal; unclassified failures are not retried.
 */
export function isRetryableFailure(kind: FailureKind): boolean {
  return RETRYABLE_FAILURES.has(kind);
}

/**
 * @param attempt The attempt that just failed (1-indexed)
 */
export function shouldRetry(kind: FailureKind, attempt: number, maxAttempts: number): boolean {
  return isRetryableFailure(kind) && attempt < maxAttempts;
}

/**
 * Delay before attempt `nextAttempt`: base * 2^(n-2), so attempt 2 waits
 * `backoffBaseS`, attempt 3 waits twice that. The first attempt never waits.
 */
export function getBackoffDelayS(nextAttempt: number, backoffBaseS: number): number {
  if (nextAttempt < 2) {
    return 0;
  }
  return backoffBaseS * Math.pow(2, nextAttempt - 2);
}
