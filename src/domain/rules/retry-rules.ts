import type { FailureReason } from '@domain/types/brief.js';

/** Only outages and deadlines are worth another attempt. */
export function isRetryable(reason: FailureReason): boolean {
  return reason === 'service-unavailable' || reason === 'timeout';
}

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), capped.
 */
export function backoffDelay(retry: number, baseMs: number, maxMs: number): number {
  if (retry < 1) return 0;
  return Math.min(maxMs, baseMs * 2 ** (retry - 1));
}
