/**
 * Bounded retry with exponential backoff.
 *
 * Only errors flagged `retryable` (TransientEnrichmentError, TransientStoreError)
 * are retried; everything else is rethrown on the first attempt.
 */

import { isRetryableError } from "../errors"

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  onRetry?: (error: unknown, attemptNumber: number, delayMs: number) => void
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms))

export function backoffDelay(baseDelayMs: number, attemptNumber: number): number {
  return baseDelayMs * 2 ** (attemptNumber - 1)
}

export async function withRetry<T>(
  operation: (attemptNumber: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts)

  for (let attemptNumber = 1; ; attemptNumber += 1) {
    try {
      return await operation(attemptNumber)
    } catch (error) {
      if (!isRetryableError(error) || attemptNumber >= maxAttempts) {
        throw error
      }

      const delayMs = backoffDelay(options.baseDelayMs, attemptNumber)
      options.onRetry?.(error, attemptNumber, delayMs)
      if (delayMs > 0) {
        await sleep(delayMs)
      }
    }
  }
}
