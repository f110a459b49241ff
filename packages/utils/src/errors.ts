/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the optimization core.
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

    // Maintains proper stack trace for where our error was thrown
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
 * Invalid argument - caller passed something the operation cannot accept
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', 400, context);
  }
}

/**
 * Malformed parameter declarations. Raised before any trial runs.
 */
export class InvalidSpaceError extends AppError {
  public readonly problems: string[];

  constructor(problems: string[], context?: Record<string, unknown>) {
    super(`Invalid parameter space: ${problems.join('; ')}`, 'INVALID_SPACE', 400, {
      problems,
      ...context,
    });
    this.problems = problems;
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
 * Search finished without a single successful trial
 */
export class NoViableResultError extends AppError {
  public readonly attempted: number;

  constructor(searchKind: string, attempted: number, context?: Record<string, unknown>) {
    super(
      `${searchKind} search produced no successful trial out of ${attempted}`,
      'NO_VIABLE_RESULT',
      422,
      { searchKind, attempted, ...context }
    );
    this.attempted = attempted;
  }
}

/**
 * Evaluation error - thrown by evaluators, recorded as a failed trial outcome
 */
export class EvaluationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EVALUATION_ERROR', 502, context);
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
 * Timeout error - for operation timeouts
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(
    message: string = 'Operation timed out',
    timeoutMs?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
