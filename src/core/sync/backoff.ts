/**
 * Retry backoff for queue items.
 */

/** Exponent cap; keeps 2 ** exponent a safe integer */
const MAX_EXPONENT = 30

/**
 * Calculate the delay before the next attempt with exponential backoff.
 *
 * @param retryCount - Failed attempts so far, including the one just recorded
 * @param baseDelay - Delay after the first failure
 * @param maxDelay - Upper bound for the delay
 * @returns Delay in milliseconds
 */
export function calculateRetryDelay(retryCount: number, baseDelay: number, maxDelay: number): number {
  const exponent = Math.min(Math.max(0, retryCount - 1), MAX_EXPONENT)
  return Math.min(maxDelay, baseDelay * 2 ** exponent)
}

/**
 * Time of the next attempt after `retryCount` failures.
 */
export function nextAttemptTime(
  now: Date,
  retryCount: number,
  baseDelay: number,
  maxDelay: number,
): Date {
  return new Date(now.getTime() + calculateRetryDelay(retryCount, baseDelay, maxDelay))
}
