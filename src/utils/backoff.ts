/**
 * Exponential backoff with jitter.
 *
 * @module utils/backoff
 */

import {
  BACKOFF_BASE_MS,
  BACKOFF_JITTER_MAX,
  BACKOFF_JITTER_MIN,
  BACKOFF_MAX_MS,
} from '../constants';

export type BackoffPolicy = {
  readonly baseMs: number;
  readonly maxMs: number;
  readonly jitterMin: number;
  readonly jitterMax: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: BACKOFF_BASE_MS,
  maxMs: BACKOFF_MAX_MS,
  jitterMin: BACKOFF_JITTER_MIN,
  jitterMax: BACKOFF_JITTER_MAX,
};

/**
 * Delay before retrying after attempt `attempt` (1-indexed):
 * min(base × 2^(attempt−1) × jitter, max), jitter uniform in [jitterMin, jitterMax].
 *
 * @param attempt - The attempt that just failed
 * @param policy - Backoff settings
 * @param random - Source of uniform [0, 1) values (injectable for tests)
 * @returns Delay in whole milliseconds
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponential = policy.baseMs * Math.pow(2, attempt - 1);
  const jitter = policy.jitterMin + random() * (policy.jitterMax - policy.jitterMin);
  return Math.min(Math.floor(exponential * jitter), policy.maxMs);
}

/**
 * Resolve after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
