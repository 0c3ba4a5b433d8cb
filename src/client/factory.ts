/**
 * Factory functions for creating StatsD clients.
 */

import { configFromEnvironment } from '../config/index.js';
import type { StatsDClientConfig } from '../types/index.js';
import { StatsDClient } from './client.js';
import type { StatsDClientOptions } from './client.js';

/**
 * Create a connected StatsD client
 */
export function createStatsDClient(
  config: Partial<StatsDClientConfig> = {},
  options?: StatsDClientOptions
): Promise<StatsDClient> {
  return StatsDClient.create(config, options);
}

/**
 * Create a connected StatsD client from STATSD_* environment variables.
 *
 * Values in `overrides` take precedence over the environment.
 */
export function createStatsDClientFromEnvironment(
  overrides: Partial<StatsDClientConfig> = {},
  options?: StatsDClientOptions & { env?: NodeJS.ProcessEnv }
): Promise<StatsDClient> {
  return StatsDClient.create(
    { ...configFromEnvironment(options?.env), ...overrides },
    options
  );
}
