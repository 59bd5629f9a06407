/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(message: string, code: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a requested record is not found
 */
export class NotFoundError extends ServiceError {
  constructor(resource: string, id?: string, details?: unknown) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends ServiceError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a database operation fails
 */
export class DatabaseError extends ServiceError {
  public readonly operation: string;

  constructor(operation: string, message: string, details?: unknown) {
    super(`Database ${operation} failed: ${message}`, 'DATABASE_ERROR', 500, details);
    this.name = 'DatabaseError';
    this.operation = operation;
  }
}

/**
 * Error thrown when there's a conflict with existing data
 */
export class ConflictError extends ServiceError {
  constructor(resource: string, message: string, details?: unknown) {
    super(`Conflict with ${resource}: ${message}`, 'CONFLICT_ERROR', 409, details);
    this.name = 'ConflictError';
  }
}

/**
 * SQLite reports constraint failures through a string `code` on the thrown error.
 */
export function isUniqueConstraintError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/**
 * Normalize anything thrown below the service layer into a ServiceError.
 */
export function toServiceError(error: unknown, operation: string, resource: string): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (isUniqueConstraintError(error)) {
    return new ConflictError(resource, message, { operation });
  }
  return new DatabaseError(operation, message, error);
}
