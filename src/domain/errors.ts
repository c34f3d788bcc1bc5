/**
 * Application error types
 * Each error type maps to specific HTTP status codes and client actions
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Resource exists but is not in a state that allows the request (409 Conflict)
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

/**
 * Artifact store failures (500 Internal Server Error)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', 500, details);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Task queue unavailable (503 Service Unavailable)
 * Only reaches a client when nothing was persisted yet.
 */
export class DispatchError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DISPATCH_ERROR', 503, details);
  }
}

/**
 * Discovery engine failure. Captured into the job's error detail, never sent as an HTTP error.
 */
export class EngineError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'ENGINE_ERROR', 500, details);
  }
}

/**
 * Callback delivery failure. Logged only.
 */
export class NotificationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOTIFICATION_ERROR', 502, details);
  }
}

/**
 * Requested feature is not available (501 Not Implemented)
 */
export class NotSupportedError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_SUPPORTED', 501, details);
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * One-line summary of an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'Unexpected error';
}
