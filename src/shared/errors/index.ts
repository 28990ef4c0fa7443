/**
 * Shared Error Classes
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Marker for errors worth another attempt (see withRetry)
 */
export interface RetryableError {
  readonly retryable: true
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 400, "VALIDATION_ERROR")
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource") {
    super(`${resource} not found`, 404, "NOT_FOUND")
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, "CONFIGURATION_ERROR")
  }
}

// Network failure, timeout or rate limit while reverse-geocoding
export class TransientEnrichmentError extends AppError implements RetryableError {
  readonly retryable = true as const

  constructor(message: string, public httpStatus: number | null = null) {
    super(message, 503, "TRANSIENT_ENRICHMENT_ERROR")
  }
}

export class TransientStoreError extends AppError implements RetryableError {
  readonly retryable = true as const

  constructor(message: string, public originalError?: unknown) {
    super(message, 503, "TRANSIENT_STORE_ERROR")
  }
}

export class NotifyError extends AppError {
  constructor(message: string, public region?: string) {
    super(message, 502, "NOTIFY_ERROR")
  }
}

export function isRetryableError(error: unknown): error is RetryableError {
  return error instanceof TransientEnrichmentError || error instanceof TransientStoreError
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message.trim()
  }

  if (typeof error === "string" && error.trim()) {
    return error.trim()
  }

  return "Unknown error"
}
