/**
 * Error handlers for runtime failures of a client.
 */

import type { ErrorHandler } from '../types/index.js';
import type { Logger } from './logger.js';

/**
 * Create a handler that ignores every error.
 *
 * A fresh function per call, so clients never share handler state.
 */
export function createNoopErrorHandler(): ErrorHandler {
  return () => {};
}

/**
 * Create a handler that logs each failure at warn level
 */
export function createLoggingErrorHandler(logger: Logger): ErrorHandler {
  return (error: Error) => {
    logger.warn('StatsD metric failure', {
      error: error.name,
      message: error.message,
    });
  };
}
