/**
 * StatsD line encoder.
 *
 * Produces `<prefix><name>:<value>|<type>[|@<rate>][|#<tags>]` for a single
 * metric point. Encoding is pure and never fails.
 */

import { METRIC_TYPE_CODES } from '../types/index.js';
import type { MetricPoint, Tags } from '../types/index.js';
import { formatSampleRate, formatValue } from './format.js';
import { formatPrefix, formatTagSuffix } from './tags.js';

/**
 * Client-wide settings applied to every encoded line
 */
export interface EncoderOptions {
  /** Name prefix, without the trailing '.' */
  prefix?: string;
  /** Tags placed before the call-site tags */
  constantTags?: Tags;
}

/**
 * Encode a metric point as one wire line
 */
export function encodeMetric(point: MetricPoint, options: EncoderOptions = {}): string {
  return new MetricEncoder(options).encode(point);
}

/**
 * Encoder bound to a fixed prefix and constant tag list
 */
export class MetricEncoder {
  private readonly prefix: string;
  private readonly constantTags: Tags;

  constructor(options: EncoderOptions = {}) {
    this.prefix = formatPrefix(options.prefix);
    this.constantTags = Object.freeze([...(options.constantTags ?? [])]);
  }

  encode(point: MetricPoint): string {
    const sampleRate = point.sampleRate ?? 1;
    const sampleSegment = sampleRate === 1 ? '' : `|@${formatSampleRate(sampleRate)}`;

    return (
      `${this.prefix}${point.name}:${formatValue(point.value)}` +
      `|${METRIC_TYPE_CODES[point.type]}` +
      sampleSegment +
      formatTagSuffix(this.constantTags, point.tags)
    );
  }
}
