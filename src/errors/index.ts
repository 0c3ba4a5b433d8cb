/**
 * Error classes for the StatsD client.
 */

// Base error
export {
  StatsDError,
  isStatsDError,
  isErrorCategory,
  toError,
} from './base.js';
export type { ErrorCategory } from './base.js';

// Configuration errors
export { ConfigurationError } from './configuration.js';

// Connection errors
export { ClientInitializationError } from './connection.js';

// Transport and lifecycle errors
export { SendError, SocketCloseError, ClientClosedError } from './transport.js';
