/**
 * @paramlab/utils - Shared utilities package
 *
 * Logger, configuration loading and error handling.
 */

export { logger, Logger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, errorMessage } from './error-handler.js';
