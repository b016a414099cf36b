/**
 * Refinery Error Classes
 */

/**
 * Base error class for the refinery
 */
export class RefineryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly httpStatus: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'RefineryError'
  }

  /**
   * Convert to API error response format
   */
  toResponse(): { error: string; message: string; details?: Record<string, unknown> } {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    }
  }
}

/**
 * Out-of-range or malformed arguments (400)
 *
 * `constraint` names the bound that was violated, e.g. `participantCount > 0`.
 */
export class InvalidInputError extends RefineryError {
  constructor(message: string, constraint: string, details?: Record<string, unknown>) {
    super(
      message,
      'INVALID_INPUT',
      400,
      { constraint, ...details }
    )
    this.name = 'InvalidInputError'
  }
}

/**
 * Persistence layer unavailable or timed out (503)
 */
export class StorageError extends RefineryError {
  constructor(
    message: string,
    public readonly transient: boolean,
    cause?: unknown
  ) {
    super(
      message,
      'STORAGE_ERROR',
      503,
      {
        transient,
        ...(cause instanceof Error ? { cause: cause.message } : {}),
      }
    )
    this.name = 'StorageError'
  }
}

/**
 * An invariant would be violated; the operation is aborted before any write lands (500)
 */
export class ConsistencyError extends RefineryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      message,
      'CONSISTENCY_ERROR',
      500,
      details
    )
    this.name = 'ConsistencyError'
  }
}

/**
 * Caller lacks the admin capability (403)
 */
export class PermissionDeniedError extends RefineryError {
  constructor(action: string) {
    super(
      `Only guild admins can ${action}`,
      'PERMISSION_DENIED',
      403,
      { action }
    )
    this.name = 'PermissionDeniedError'
  }
}

/**
 * Rate limited error (429)
 */
export class RateLimitedError extends RefineryError {
  constructor(public readonly retryAfter: number) {
    super(
      'Too many requests',
      'RATE_LIMITED',
      429,
      { retryAfter }
    )
    this.name = 'RateLimitedError'
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends RefineryError {
  constructor(message: string, resource?: string) {
    super(
      message,
      'NOT_FOUND',
      404,
      resource ? { resource } : undefined
    )
    this.name = 'NotFoundError'
  }
}

export const STORAGE_RETRY_MESSAGE = 'The refinery ledger is unavailable right now. Please try again in a moment.'
export const INTERNAL_ERROR_MESSAGE = 'Something went wrong on our side. The guild officers have been notified.'

/**
 * Text shown to a chat user for a failed command
 *
 * Storage and consistency failures never expose their internals here.
 */
export function userMessageFor(error: unknown): string {
  if (error instanceof StorageError) {
    return STORAGE_RETRY_MESSAGE
  }
  if (error instanceof RateLimitedError) {
    return `Slow down! Try again in ${error.retryAfter}s.`
  }
  if (error instanceof RefineryError && !(error instanceof ConsistencyError)) {
    return error.message
  }
  return INTERNAL_ERROR_MESSAGE
}
