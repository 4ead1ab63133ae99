/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
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
 * Error thrown when a git invocation fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * A subprocess ran to completion but the caller treats its exit status as a failure.
 */
export class ProcessError extends AppError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message)
    this.name = 'ProcessError'
  }
}

/**
 * The executable could not be started at all (missing binary, bad cwd).
 */
export class SpawnError extends AppError {
  constructor(
    message: string,
    public readonly command: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'SpawnError'
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/**
 * Error thrown when a validation check fails.
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
 * Merge/pull output contained a conflict or failure marker.
 */
export class ConflictDetectedError extends AppError {
  constructor(
    message: string,
    public readonly marker: string
  ) {
    super(message)
    this.name = 'ConflictDetectedError'
  }
}

/**
 * Restoring the saved commit after a failed update did not succeed.
 * The working tree may be left mid-merge.
 */
export class RollbackFailedError extends AppError {
  constructor(
    message: string,
    public readonly rollbackCommit: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'RollbackFailedError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
