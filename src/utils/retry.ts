/**
 * Retry with exponential backoff and full jitter.
 */

import type { RetryPolicy } from '../types/index.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 100,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Backoff before the next attempt, drawn uniformly from [0, baseDelayMs * 2^attempt).
 *
 * @param attempt - Number of failed attempts so far (1 after the first failure)
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  random: () => number = Math.random
): number {
  const maxDelay = baseDelayMs * Math.pow(2, attempt);
  return Math.min(Math.floor(random() * maxDelay), maxDelay);
}

/**
 * Run an operation, retrying on any error.
 *
 * Every error is treated as retryable, including ones an ApiError marks as not retryable.
 * Callers that need to stop early on a fatal error must classify before calling this.
 * Once retries are exhausted, or `signal` has been aborted, the last error is rethrown unchanged.
 */
export async function retry<T>(
  operation: () => Promise<T>,
  maxRetries: number = DEFAULT_RETRY_POLICY.maxRetries,
  baseDelayMs: number = DEFAULT_RETRY_POLICY.baseDelayMs,
  signal?: AbortSignal
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      attempt++;
      if (attempt > maxRetries || signal?.aborted) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, baseDelayMs);
      console.log(`[Retry] Attempt ${attempt}/${maxRetries} failed, retrying in ${delayMs}ms...`);
      await sleep(delayMs);
    }
  }
}

/**
 * Run an operation under a retry policy.
 */
export function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  signal?: AbortSignal
): Promise<T> {
  return retry(operation, policy.maxRetries, policy.baseDelayMs, signal);
}
