/**
 * Environment variable configuration for the StatsD client
 */

import type { StatsDClientConfig } from '../types/index.js';

/**
 * Parse a comma-separated tag list, dropping blank entries
 *
 * Expected format: "env:prod,region:us"
 */
function parseTags(tagsString: string): string[] {
  return tagsString
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

/**
 * Parse numeric environment variable
 *
 * @returns Parsed number or undefined if unset or not numeric
 */
function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Create configuration from environment variables
 *
 * Reads:
 * - STATSD_HOST - Daemon hostname
 * - STATSD_PORT - Daemon UDP port
 * - STATSD_PREFIX - Metric name prefix
 * - STATSD_TAGS - Constant tags, comma separated
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Partial configuration from environment variables
 */
export function configFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Partial<StatsDClientConfig> {
  const config: Partial<StatsDClientConfig> = {};

  if (env.STATSD_HOST) {
    config.host = env.STATSD_HOST;
  }

  const port = parseNumber(env.STATSD_PORT);
  if (port !== undefined) {
    config.port = port;
  }

  if (env.STATSD_PREFIX) {
    config.prefix = env.STATSD_PREFIX;
  }

  if (env.STATSD_TAGS) {
    config.constantTags = parseTags(env.STATSD_TAGS);
  }

  return config;
}
