/**
 * Tests for tag suffix and prefix construction.
 */

import { describe, it, expect } from 'vitest';
import { formatPrefix, formatTagSuffix } from '../../src/protocol/tags.js';

describe('formatTagSuffix', () => {
  it('should return an empty string when there are no tags', () => {
    expect(formatTagSuffix()).toBe('');
    expect(formatTagSuffix([], [])).toBe('');
  });

  it('should format constant tags alone', () => {
    expect(formatTagSuffix(['env:prod'], [])).toBe('|#env:prod');
  });

  it('should format call tags alone', () => {
    expect(formatTagSuffix([], ['region:us'])).toBe('|#region:us');
  });

  it('should place constant tags before call tags, each in the given order', () => {
    // Each list keeps its forward order; neither list is reversed.
    expect(formatTagSuffix(['a', 'b'], ['c', 'd'])).toBe('|#a,b,c,d');
  });

  it('should separate n tags with n - 1 commas and no trailing comma', () => {
    const pool = ['t1', 't2', 't3'];

    for (let c = 0; c <= 3; c++) {
      for (let t = 0; t <= 3; t++) {
        const suffix = formatTagSuffix(pool.slice(0, c), pool.slice(0, t));

        if (c + t === 0) {
          expect(suffix).toBe('');
          continue;
        }

        expect(suffix.startsWith('|#')).toBe(true);
        expect(suffix.split(',').length - 1).toBe(c + t - 1);
        expect(suffix.endsWith(',')).toBe(false);
      }
    }
  });

  it('should write tag content verbatim', () => {
    expect(formatTagSuffix(['a,b'], ['c|d'])).toBe('|#a,b,c|d');
  });
});

describe('formatPrefix', () => {
  it('should append a dot separator', () => {
    expect(formatPrefix('app')).toBe('app.');
  });

  it('should return an empty string for a missing or empty prefix', () => {
    expect(formatPrefix()).toBe('');
    expect(formatPrefix('')).toBe('');
  });
});
