// src/utils/errors.ts
// ═══════════════════════════════════════════════════════════════════════════
// Error types raised while turning request parameters into queries
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      isOperational?: boolean;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.statusCode = options.statusCode || 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, {
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      isOperational: true,
      context,
    });
  }
}

/**
 * A request parameter the operation cannot run without was absent or empty
 */
export class MissingParameterError extends AppError {
  public readonly param: string;

  constructor(param: string) {
    super(`Required query parameter (${param}) undefined!`, {
      code: 'MISSING_PARAMETER',
      statusCode: 400,
      isOperational: true,
      context: { param },
    });
    this.param = param;
  }
}

/**
 * Filter or sort named a column the result set does not have
 */
export class InvalidColumnError extends AppError {
  public readonly column: string;

  constructor(column: string, source: string) {
    super(`Unknown column '${column}' on ${source}`, {
      code: 'INVALID_COLUMN',
      statusCode: 400,
      isOperational: true,
      context: { column, source },
    });
    this.column = column;
  }
}

/**
 * Database error
 */
export class DatabaseError extends AppError {
  constructor(operation: string, message: string, originalError?: Error) {
    super(`Database ${operation} failed: ${message}`, {
      code: 'DATABASE_ERROR',
      statusCode: 500,
      isOperational: false,
      context: { operation },
      cause: originalError,
    });
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Creates a structured error object for logging
 */
export function toErrorObject(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      isOperational: error.isOperational,
      context: error.context,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: getErrorMessage(error),
    rawError: error,
  };
}
