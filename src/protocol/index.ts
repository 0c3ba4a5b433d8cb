/**
 * Wire protocol exports
 */

export { encodeMetric, MetricEncoder } from './encoder.js';
export type { EncoderOptions } from './encoder.js';
export { formatFixed, formatValue, formatSampleRate, FRACTION_DIGITS } from './format.js';
export { formatTagSuffix, formatPrefix } from './tags.js';
