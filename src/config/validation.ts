/**
 * Configuration validation for the StatsD client
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { createNoopErrorHandler } from '../logging/error-handler.js';
import { NoopLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import type {
  ErrorHandler,
  RandomSource,
  StatsDClientConfig,
} from '../types/index.js';

/**
 * Fully resolved, immutable client configuration
 */
export interface ResolvedClientConfig {
  readonly host: string;
  readonly port: number;
  readonly prefix: string;
  readonly constantTags: readonly string[];
  readonly errorHandler: ErrorHandler;
  readonly logger: Logger;
  readonly random: RandomSource;
}

const isFunction = (value: unknown): boolean => typeof value === 'function';

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  prefix: z.string().optional(),
  constantTags: z.array(z.string()).optional(),
  errorHandler: z.custom<ErrorHandler>(isFunction, 'must be a function').optional(),
  logger: z
    .custom<Logger>(
      (value) => typeof value === 'object' && value !== null,
      'must be a logger'
    )
    .optional(),
  random: z.custom<RandomSource>(isFunction, 'must be a function').optional(),
});

/**
 * Validate a configuration and resolve its optional fields.
 *
 * @throws ConfigurationError if validation fails
 */
export function validateConfig(config: StatsDClientConfig): ResolvedClientConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw ConfigurationError.fromIssues(
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }

  const parsed = result.data;
  return Object.freeze({
    host: parsed.host,
    port: parsed.port,
    prefix: parsed.prefix ?? '',
    constantTags: Object.freeze([...(parsed.constantTags ?? [])]),
    errorHandler: parsed.errorHandler ?? createNoopErrorHandler(),
    logger: parsed.logger ?? new NoopLogger(),
    random: parsed.random ?? Math.random,
  });
}
