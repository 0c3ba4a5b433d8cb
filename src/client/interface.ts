/**
 * MetricsClient interface
 */

import type { MetricValue, Tags } from '../types/index.js';

/**
 * Capability set of a StatsD client.
 *
 * Every recording method has an unsampled form and a sampled form taking a
 * sample rate in (0, 1] before the tags. Recording never throws.
 */
export interface MetricsClient {
  /**
   * Adjust a counter by `delta`
   */
  count(aspect: string, delta: MetricValue, tags?: Tags): void;
  count(aspect: string, delta: MetricValue, sampleRate: number, tags?: Tags): void;

  /**
   * Increment a counter by one
   */
  increment(aspect: string, tags?: Tags): void;
  increment(aspect: string, sampleRate: number, tags?: Tags): void;

  /**
   * Decrement a counter by one
   */
  decrement(aspect: string, tags?: Tags): void;
  decrement(aspect: string, sampleRate: number, tags?: Tags): void;

  /**
   * Record the latest value of a gauge
   */
  gauge(aspect: string, value: MetricValue, tags?: Tags): void;
  gauge(aspect: string, value: MetricValue, sampleRate: number, tags?: Tags): void;

  /**
   * Record an execution time in milliseconds
   */
  time(aspect: string, timeInMs: MetricValue, tags?: Tags): void;
  time(aspect: string, timeInMs: MetricValue, sampleRate: number, tags?: Tags): void;

  /**
   * Record a histogram value
   */
  histogram(aspect: string, value: MetricValue, tags?: Tags): void;
  histogram(aspect: string, value: MetricValue, sampleRate: number, tags?: Tags): void;

  /**
   * Release the connection. Safe to call more than once.
   */
  stop(): Promise<void>;
}
