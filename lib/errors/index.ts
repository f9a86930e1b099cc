/**
 * Typed Error Hierarchy
 *
 * Route handlers catch these and map them to `{ error, code }` responses
 * with the error's status code.
 *
 * @example
 * ```ts
 * throw new ValidationError('total_papers must be a positive integer', 'INVALID_REQUEST', 'total_papers')
 * ```
 */

// ============================================================================
// Base Error
// ============================================================================

export class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500
  ) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode

    Error.captureStackTrace(this, this.constructor)
  }
}

// ============================================================================
// Client Errors (4xx)
// ============================================================================

/**
 * 400 Bad Request - malformed or missing form fields
 */
export class ValidationError extends AppError {
  public readonly field?: string

  constructor(message: string, code: string = 'INVALID_REQUEST', field?: string) {
    super(message, code, 400)
    this.field = field
  }
}

/**
 * 400 Bad Request - download filename missing, unsafe or malformed
 */
export class DeliveryError extends AppError {
  constructor(message: string, code: string = 'INVALID_FILENAME', statusCode: number = 400) {
    super(message, code, statusCode)
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  public readonly resource?: string

  constructor(message: string = 'Resource not found', code: string = 'NOT_FOUND', resource?: string) {
    super(message, code, 404)
    this.resource = resource
  }
}

// ============================================================================
// External API Errors
// ============================================================================

/**
 * Failure talking to the paper-search API. `retryable` tells the retry
 * policy whether another attempt can succeed.
 */
export class ExternalApiError extends AppError {
  public readonly retryable: boolean
  public readonly upstreamStatus?: number

  constructor(
    message: string,
    code: string = 'EXTERNAL_API_ERROR',
    options: { retryable?: boolean; statusCode?: number; upstreamStatus?: number } = {}
  ) {
    super(message, code, options.statusCode ?? 502)
    this.retryable = options.retryable ?? true
    this.upstreamStatus = options.upstreamStatus
  }
}

/**
 * 429 from upstream
 */
export class RateLimitError extends ExternalApiError {
  public readonly retryAfterMs?: number

  constructor(message: string = 'Rate limit exceeded', retryAfterMs?: number) {
    super(message, 'RATE_LIMITED', { statusCode: 429, upstreamStatus: 429 })
    this.retryAfterMs = retryAfterMs
  }
}

export class PaperSourceNotFoundError extends ExternalApiError {
  constructor(message: string = 'Paper source returned 404') {
    super(message, 'UPSTREAM_NOT_FOUND', { upstreamStatus: 404 })
  }
}

/**
 * 5xx, connection failures and timeouts
 */
export class TransientNetworkError extends ExternalApiError {
  constructor(message: string, upstreamStatus?: number) {
    super(message, 'TRANSIENT_NETWORK', { statusCode: 503, upstreamStatus })
  }
}

/**
 * Upstream refused the request outright (bad key, bad parameters, bad body).
 */
export class PaperSourceRejectedError extends ExternalApiError {
  constructor(message: string, upstreamStatus?: number) {
    super(message, 'UPSTREAM_REJECTED', { retryable: false, upstreamStatus })
  }
}

// ============================================================================
// Domain-Specific Errors
// ============================================================================

/**
 * No query produced a single paper
 */
export class JobFailureError extends AppError {
  public readonly failedQueries: string[]

  constructor(message: string = 'Failed to generate JSON', failedQueries: string[] = []) {
    super(message, 'JOB_FAILED', 500)
    this.failedQueries = failedQueries
  }
}

/**
 * No generated document is stored under the requested filename
 */
export class DocumentNotFoundError extends NotFoundError {
  constructor(filename: string) {
    super(`No generated document named ${filename}`, 'DOCUMENT_NOT_FOUND', 'document')
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

export function isExternalApiError(error: unknown): error is ExternalApiError {
  return error instanceof ExternalApiError
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
