/**
 * Error taxonomy
 * ==============
 *
 * Every error raised synchronously by a container, binding or owner extends
 * `PropertyError`, so callers (a CLI front end, a form) can catch the whole
 * family and report `code` and `message` to the user. Errors thrown by
 * listeners never reach the caller; the notification queue logs them.
 */

type ErrorDetails = Record<string, unknown>

class PropertyError extends Error {
  public code: string
  public details?: ErrorDetails

  constructor(message: string, code = 'PROPERTY_ERROR', details?: ErrorDetails) {
    super(message)
    this.name = 'PropertyError'
    this.code = code
    this.details = details
  }
}

/**
 * The cast function could not convert the input. Carries the original
 * failure as `cause`.
 */
class CastError extends PropertyError {
  public cause: unknown

  constructor(message: string, cause: unknown, details?: ErrorDetails) {
    super(message, 'CAST_ERROR', details)
    this.name = 'CastError'
    this.cause = cause
  }
}

/** Raised by `set()` for an invalid value when invalid values are not allowed. */
class ValidationError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', details)
    this.name = 'ValidationError'
  }
}

class DuplicateNameError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DUPLICATE_NAME', details)
    this.name = 'DuplicateNameError'
  }
}

class LengthMismatchError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'LENGTH_MISMATCH', details)
    this.name = 'LengthMismatchError'
  }
}

class ValueNotFoundError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALUE_NOT_FOUND', details)
    this.name = 'ValueNotFoundError'
  }
}

class InvalidOrderError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'INVALID_ORDER', details)
    this.name = 'InvalidOrderError'
  }
}

class IllegalSyncError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'ILLEGAL_SYNC', details)
    this.name = 'IllegalSyncError'
  }
}

class IndexError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'INDEX_OUT_OF_RANGE', details)
    this.name = 'IndexError'
  }
}

class UnknownPropertyError extends PropertyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'UNKNOWN_PROPERTY', details)
    this.name = 'UnknownPropertyError'
  }
}

/** Extracts a printable message from anything a validate function threw. */
function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export {
  PropertyError,
  CastError,
  ValidationError,
  DuplicateNameError,
  LengthMismatchError,
  ValueNotFoundError,
  InvalidOrderError,
  IllegalSyncError,
  IndexError,
  UnknownPropertyError,
  errorMessage,
  type ErrorDetails
}
