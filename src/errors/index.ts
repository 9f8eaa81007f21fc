/**
 * Custom Error Classes
 * 
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures (configuration, command-line input)
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for a table that does not match the expected input schema
 */
export class SchemaError extends AppError {
  constructor(message: string, public table: string, public column?: string) {
    super(message, 'SCHEMA_ERROR', 500);
  }
}

/**
 * Error for database operations
 */
export class DatabaseError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', 500, cause);
  }
}

/**
 * Error for a database that never became reachable
 */
export class ConnectivityError extends AppError {
  constructor(message: string, public attempts: number, cause?: Error) {
    super(message, 'CONNECTIVITY_ERROR', 503, cause);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
