/**
 * Logging module exports
 */

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  DEFAULT_LOG_CONFIG,
  createLogger,
  createNoopLogger,
} from './logger.js';
export type { Logger, LogConfig, LogSink } from './logger.js';
export { createNoopErrorHandler, createLoggingErrorHandler } from './error-handler.js';
