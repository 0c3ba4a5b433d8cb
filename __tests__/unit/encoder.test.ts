/**
 * Tests for the StatsD line encoder.
 */

import { describe, it, expect } from 'vitest';
import { encodeMetric, MetricEncoder } from '../../src/protocol/encoder.js';
import { MetricType } from '../../src/types/index.js';

describe('encodeMetric', () => {
  it('should encode counters without prefix or tags', () => {
    expect(encodeMetric({ name: 'x', type: MetricType.COUNTER, value: 1 })).toBe('x:1|c');
    expect(encodeMetric({ name: 'x', type: MetricType.COUNTER, value: -1 })).toBe('x:-1|c');
  });

  it('should use the type code of each metric type', () => {
    expect(encodeMetric({ name: 'g', type: MetricType.GAUGE, value: 7 })).toBe('g:7|g');
    expect(encodeMetric({ name: 't', type: MetricType.TIMER, value: 250 })).toBe('t:250|ms');
    expect(encodeMetric({ name: 'h', type: MetricType.HISTOGRAM, value: 3 })).toBe('h:3|h');
  });

  it('should apply prefix and constant tags before call tags', () => {
    const line = encodeMetric(
      { name: 'hits', type: MetricType.COUNTER, value: 1, tags: ['region:us'] },
      { prefix: 'app', constantTags: ['env:prod'] }
    );

    expect(line).toBe('app.hits:1|c|#env:prod,region:us');
  });

  it('should encode fractional values with six digits', () => {
    expect(encodeMetric({ name: 'load', type: MetricType.GAUGE, value: 1 / 3 })).toBe(
      'load:0.333333|g'
    );
    expect(
      encodeMetric({
        name: 'latency',
        type: MetricType.HISTOGRAM,
        value: 12.75,
        tags: ['route:/a'],
      })
    ).toBe('latency:12.750000|h|#route:/a');
  });

  it('should add the sample rate segment only when the rate is not 1', () => {
    const unsampled = encodeMetric({
      name: 'q',
      type: MetricType.TIMER,
      value: 250,
      sampleRate: 1,
    });
    const sampled = encodeMetric({
      name: 'q',
      type: MetricType.TIMER,
      value: 250,
      sampleRate: 0.5,
      tags: ['db:main'],
    });

    expect(unsampled).toBe('q:250|ms');
    expect(unsampled.includes('|@')).toBe(false);
    expect(sampled).toBe('q:250|ms|@0.500000|#db:main');
    expect(sampled.split('|@').length - 1).toBe(1);
  });
});

describe('MetricEncoder', () => {
  it('should not see later changes to the constant tag array', () => {
    const constantTags = ['a'];
    const encoder = new MetricEncoder({ constantTags });
    constantTags.push('b');

    expect(encoder.encode({ name: 'x', type: MetricType.COUNTER, value: 1 })).toBe('x:1|c|#a');
  });

  it('should encode bigint values as integers', () => {
    const encoder = new MetricEncoder({ prefix: 'svc' });

    expect(
      encoder.encode({ name: 'bytes', type: MetricType.GAUGE, value: 9007199254740993n })
    ).toBe('svc.bytes:9007199254740993|g');
  });
});
