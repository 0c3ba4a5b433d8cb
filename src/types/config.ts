/**
 * Configuration types for the StatsD client.
 */

import type { Logger } from '../logging/logger.js';

/**
 * Receives every runtime failure of a client (send, close, use after stop)
 */
export type ErrorHandler = (error: Error) => void;

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * StatsD client configuration
 */
export interface StatsDClientConfig {
  /** Hostname or address of the StatsD daemon */
  host: string;
  /** UDP port of the StatsD daemon */
  port: number;
  /** Prefix applied to every metric name; a '.' separator is added */
  prefix?: string;
  /** Tags added to every metric, before the call-site tags */
  constantTags?: readonly string[];
  /** Handler for runtime failures (defaults to a no-op) */
  errorHandler?: ErrorHandler;
  /** Logger for lifecycle events (defaults to a no-op logger) */
  logger?: Logger;
  /** Random source for sampling decisions (defaults to Math.random) */
  random?: RandomSource;
}
