/**
 * Type exports
 */

export { MetricType, METRIC_TYPE_CODES } from './metric.js';
export type { MetricPoint, MetricValue, Tags } from './metric.js';
export type { ErrorHandler, RandomSource, StatsDClientConfig } from './config.js';
