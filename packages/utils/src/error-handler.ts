/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import { AppError, isOperationalError } from './errors.js';
import { logger } from './logger.js';

/**
 * Log an error at the level its kind calls for. Callers rethrow.
 */
export function handleError(error: unknown, context?: Record<string, unknown>): void {
  // Convert unknown errors to Error instances
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    // Operational errors - log as warn
    if (isOperationalError(err)) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      // Programming errors - log as error
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }
}

/**
 * Describe an unknown thrown value as a plain message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
