/**
 * Error Handler
 * =============
 * Centralized error logging for recovered and fatal failures.
 */

import { AppError, isFatalLoadError } from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  fatal: boolean;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  // Convert unknown errors to Error instances
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    // Operational errors - log as warn
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
        },
      });
    } else {
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    fatal: isFatalLoadError(err),
  };
}
