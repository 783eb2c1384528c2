/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the evaluation jobs and adapters.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Database error - for database operation failures
 */
export class DatabaseError extends AppError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'DATABASE_ERROR', 500, { operation, ...context });
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Evaluation cycle aborted by an infrastructure failure. Nothing was persisted.
 */
export class EvaluationCycleError extends AppError {
  public readonly stage: 'read_prices' | 'persist_results' | 'read_results';

  constructor(
    stage: EvaluationCycleError['stage'],
    cause: unknown,
    context?: Record<string, unknown>
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Evaluation cycle aborted at ${stage}: ${reason}`, 'EVALUATION_CYCLE_ABORTED', 503, {
      stage,
      ...context,
    });
    this.stage = stage;
    this.cause = cause;
  }
}

/**
 * Check if error is a retryable error
 */
export function isRetryableError(error: Error): boolean {
  return error instanceof DatabaseError || error instanceof EvaluationCycleError;
}
