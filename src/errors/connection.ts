/**
 * Connection-related errors.
 *
 * Raised while opening the datagram socket. These are the only failures
 * surfaced to the caller; everything after construction goes to the
 * client's error handler.
 */

import { StatsDError } from './base.js';

/**
 * Error thrown when the client cannot open its connection to the daemon
 */
export class ClientInitializationError extends StatsDError {
  constructor(
    host: string,
    port: number,
    options?: { cause?: Error; details?: Record<string, unknown> }
  ) {
    super({
      category: 'connection',
      message: 'Failed to start StatsD client',
      details: { host, port, ...options?.details },
      cause: options?.cause,
    });
    this.name = 'ClientInitializationError';
  }
}
