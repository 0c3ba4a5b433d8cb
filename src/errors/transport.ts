/**
 * Transport and lifecycle errors.
 *
 * None of these are thrown to callers of the recording methods; they are
 * delivered to the configured error handler.
 */

import { StatsDError } from './base.js';

/**
 * Error reported when a datagram could not be sent
 */
export class SendError extends StatsDError {
  constructor(
    message: string,
    options?: { cause?: Error; details?: Record<string, unknown> }
  ) {
    super({
      category: 'transport',
      message: `Failed to send metric: ${message}`,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'SendError';
  }
}

/**
 * Error reported when the socket could not be closed
 */
export class SocketCloseError extends StatsDError {
  constructor(options?: { cause?: Error; details?: Record<string, unknown> }) {
    super({
      category: 'transport',
      message: 'Failed to close StatsD socket',
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'SocketCloseError';
  }
}

/**
 * Error reported when a metric is recorded after the client was stopped
 */
export class ClientClosedError extends StatsDError {
  constructor(metric: string) {
    super({
      category: 'lifecycle',
      message: `StatsD client is stopped, metric not sent: ${metric}`,
      details: { metric },
    });
    this.name = 'ClientClosedError';
  }
}
