import { RateLimitError, isExternalApiError } from '@/lib/errors'

export interface RetryAttempt {
  /** 1-based number of the attempt that just failed */
  attempt: number
  /** Total attempts allowed (first try + retries) */
  maxAttempts: number
  delayMs: number
  error: unknown
}

export interface RetryOptions {
  retries: number
  factor: number
  minTimeout: number
  maxTimeout: number
  shouldRetry?: (error: unknown) => boolean
  onRetry?: (attempt: RetryAttempt) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  retries: 3,
  factor: 2,
  minTimeout: 2_000,
  maxTimeout: 10_000
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Retries errors the paper source marks as retryable; everything else is
 * rethrown straight away.
 */
export function isRetryable(error: unknown): boolean {
  return isExternalApiError(error) && error.retryable
}

export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'factor' | 'minTimeout' | 'maxTimeout'>, error?: unknown): number {
  const exponential = Math.min(options.minTimeout * Math.pow(options.factor, attempt - 1), options.maxTimeout)
  if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
    return Math.min(Math.max(error.retryAfterMs, exponential), options.maxTimeout)
  }
  return exponential
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<T> {
  const { retries, shouldRetry = isRetryable, onRetry } = options
  const maxAttempts = retries + 1

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error
      }
      const delayMs = backoffDelay(attempt, options, error)
      onRetry?.({ attempt, maxAttempts, delayMs, error })
      await sleep(delayMs)
    }
  }
}
