/**
 * Custom error classes for the notifier and the tracking endpoint.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * No reply arrived within the operative deadline.
 */
export class TransportTimeoutError extends AppError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'TransportTimeoutError'
  }
}

/**
 * Connection-level failure (refused, reset, TLS) or a non-success wire status.
 */
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'TransportError'
  }
}

/**
 * The reply could not be decoded as an update response.
 */
export class ProtocolError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'ProtocolError'
  }
}

/**
 * The tracking service answered with `status: "error"`.
 */
export class ServerRejectedError extends AppError {
  constructor(public readonly serverMessage: string) {
    super(`Request failed: ${serverMessage}`)
    this.name = 'ServerRejectedError'
  }
}

export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown when input from the hook or a seed file is malformed.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * A git command run for the notifier or an update job failed.
 */
export class GitOperationError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitOperationError'
  }
}
