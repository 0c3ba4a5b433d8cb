/**
 * Default configuration values for the StatsD client
 */

import type { StatsDClientConfig } from '../types/index.js';

export const DEFAULT_HOST = 'localhost';

export const DEFAULT_PORT = 8125;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Pick<StatsDClientConfig, 'host' | 'port'> = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
};

/**
 * Apply default values to a partial configuration
 *
 * @param config - Partial configuration to apply defaults to
 * @returns Configuration with defaults applied
 */
export function applyDefaults(config: Partial<StatsDClientConfig>): StatsDClientConfig {
  return {
    ...config,
    host: config.host ?? DEFAULT_CONFIG.host,
    port: config.port ?? DEFAULT_CONFIG.port,
  };
}
