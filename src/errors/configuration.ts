/**
 * Configuration-related errors.
 */

import { StatsDError } from './base.js';

/**
 * Error thrown when configuration is invalid or missing required fields
 */
export class ConfigurationError extends StatsDError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'configuration',
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }

  /**
   * Create a ConfigurationError from a list of validation issues
   */
  static fromIssues(issues: readonly string[]): ConfigurationError {
    return new ConfigurationError(
      `Invalid configuration: ${issues.join(', ')}`,
      { issues: [...issues] }
    );
  }
}
