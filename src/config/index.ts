/**
 * Configuration module
 */

export { DEFAULT_CONFIG, DEFAULT_HOST, DEFAULT_PORT, applyDefaults } from './defaults.js';
export { validateConfig } from './validation.js';
export type { ResolvedClientConfig } from './validation.js';
export { configFromEnvironment } from './env.js';
