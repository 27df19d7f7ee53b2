/**
 * Application Error Classes
 * Centralized error definitions for consistent error handling
 */

/**
 * Error details for additional context
 */
export interface ErrorDetails {
  field?: string;
  value?: unknown;
  constraint?: string;
  [key: string]: unknown;
}

/**
 * Base Application Error
 * All custom errors should extend this class
 */
export class AppError extends Error {
  public readonly timestamp: Date;
  public readonly isOperational: boolean;

  constructor(
    public readonly message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: ErrorDetails | ErrorDetails[],
    options?: { cause?: unknown; isOperational?: boolean }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.isOperational = options?.isOperational ?? true;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * 400 - Bad Request / Validation Error
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails | ErrorDetails[]) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * 404 - Not Found
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string | number) {
    const message = identifier
      ? `${resource} with ID '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404, 'NOT_FOUND', { resource, identifier });
  }
}

/**
 * 409 - Conflict (duplicate, already exists)
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 409, 'CONFLICT', details);
  }
}

/**
 * 422 - Unprocessable Entity (business rule violation)
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 422, 'BUSINESS_RULE_VIOLATION', details);
  }
}

/**
 * Misconfigured component (missing model, unbound manager)
 * Programming error, never shown to end users
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 500, 'CONFIGURATION_ERROR', details, { isOperational: false });
  }
}

/**
 * Unexpected failure inside a repository operation
 * The original error is kept as `cause`
 */
export class RepositoryOperationError extends AppError {
  constructor(operation: string, cause: unknown, details?: ErrorDetails) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${reason}`, 500, 'OPERATION_FAILED', { operation, ...details }, {
      cause,
      isOperational: false,
    });
  }
}

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is operational (expected) vs programming error
 */
export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}
