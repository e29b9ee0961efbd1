/**
 * Timeout and retry utilities for async operations
 *
 * Keeps slow or unresponsive delivery targets from stalling a cascade.
 */

import { DeliveryTimeoutError } from './errors.js'

export interface RetryOptions {
  maxAttempts?: number
  delayMs?: number
  backoffMultiplier?: number
  onRetry?: (attempt: number, error: Error) => void
  /** Return false to stop retrying early */
  shouldRetry?: (error: Error) => boolean
}

/**
 * Retry an async operation with exponential backoff
 *
 * @example
 * ```ts
 * const receipt = await withRetry(
 *   () => deliver(event),
 *   { maxAttempts: 3, delayMs: 1000 }
 * )
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    onRetry,
    shouldRetry
  } = options

  let lastError: Error | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))

      if (attempt === maxAttempts || (shouldRetry && !shouldRetry(lastError))) {
        break
      }

      if (onRetry) {
        onRetry(attempt, lastError)
      }

      // Exponential backoff: 1s, 2s, 4s, 8s, etc.
      const delay = delayMs * Math.pow(backoffMultiplier, attempt - 1)
      await new Promise(resolve => setTimeout(resolve, delay))
    }
  }

  throw lastError ?? new Error('withRetry failed with unknown error')
}

/**
 * Wrap a promise with a timeout
 *
 * @throws DeliveryTimeoutError when the timeout is reached first
 *
 * @example
 * ```ts
 * await withTimeout(deliver(event), 30000, 'deliver lib-core reValidate')
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new DeliveryTimeoutError(operation, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
