/**
 * Metric-related types for StatsD wire encoding.
 */

/**
 * Metric type enumeration, one entry per StatsD wire type
 */
export enum MetricType {
  /** Counter - increments/decrements */
  COUNTER = 'counter',
  /** Gauge - point-in-time value */
  GAUGE = 'gauge',
  /** Timer - execution time in milliseconds */
  TIMER = 'timer',
  /** Histogram - statistical distribution */
  HISTOGRAM = 'histogram',
}

/**
 * Wire type code for each metric type
 */
export const METRIC_TYPE_CODES: Readonly<Record<MetricType, string>> = {
  [MetricType.COUNTER]: 'c',
  [MetricType.GAUGE]: 'g',
  [MetricType.TIMER]: 'ms',
  [MetricType.HISTOGRAM]: 'h',
};

/**
 * A metric value. Integers (bigint, or an integral number) are written as
 * plain integers; other numbers as fixed-point with 6 fractional digits.
 */
export type MetricValue = number | bigint;

/**
 * Ordered list of `key:value` tags
 */
export type Tags = readonly string[];

/**
 * A single metric data point, alive for one encode+send call
 */
export interface MetricPoint {
  /** Metric name (aspect), without the client prefix */
  readonly name: string;
  /** Metric type */
  readonly type: MetricType;
  /** Metric value */
  readonly value: MetricValue;
  /** Sample rate (defaults to 1.0) */
  readonly sampleRate?: number;
  /** Call-site tags */
  readonly tags?: Tags;
}
