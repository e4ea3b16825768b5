/**
 * Application error types
 * Each error type carries a stable code and the exit code the CLI reports it with
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found errors
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 1, { resource, id });
  }
}

/**
 * Job id collision on insert; the caller generates a new id and retries
 */
export class DuplicateIdError extends AppError {
  constructor(id: string) {
    super(`Job id ${id} already exists`, 'DUPLICATE_ID', 1, { id });
  }
}

/**
 * Conditional transition lost: the persisted status (or attempt count) no longer
 * matches what the writer expected. Internal concurrency guard, never a job failure.
 */
export class StaleTransitionError extends AppError {
  constructor(
    public readonly jobId: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      `Stale transition for job ${jobId}: expected ${expected}, found ${actual}`,
      'STALE_TRANSITION',
      1,
      { jobId, expected, actual }
    );
  }
}

/**
 * Transition outside the job state machine, or one that would break a record invariant
 */
export class InvalidTransitionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_TRANSITION', 1, details);
  }
}

/**
 * Database operation errors
 */
export class DatabaseError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    public readonly sqliteCode: string | null = null
  ) {
    super(message, 'DATABASE_ERROR', 1, details);
  }
}

/**
 * Validation errors from user input
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 2, details);
  }
}

/**
 * Configuration errors - fail fast on startup
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 1, details);
  }
}

export type FailureClassification = 'transient' | 'permanent' | 'unknown';

/**
 * Failure reported by a generation backend, already classified at the client boundary
 */
export class GenerationError extends AppError {
  constructor(
    message: string,
    public readonly classification: FailureClassification,
    public readonly reason: string,
    details?: unknown
  ) {
    super(message, 'GENERATION_ERROR', 1, {
      classification,
      reason,
      ...(typeof details === 'object' && details !== null ? details : {}),
    });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
