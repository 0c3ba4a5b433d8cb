/**
 * Number formatting for the StatsD wire protocol.
 */

import type { MetricValue } from '../types/index.js';

/**
 * Fractional digits written for non-integer values and sample rates
 */
export const FRACTION_DIGITS = 6;

const SCALE = 10n ** BigInt(FRACTION_DIGITS);

/**
 * Values that sit exactly halfway between two 6-digit decimals are the
 * doubles of the form odd / 2^7; everything else has a unique nearest
 * 6-digit decimal, which toFixed already returns.
 */
const TIE_DENOMINATOR = 128;

/**
 * Format a number with exactly 6 fractional digits, rounding half-even.
 *
 * Non-finite values are written as `NaN`, `Infinity` and `-Infinity`.
 */
export function formatFixed(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const magnitude = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (Number.isInteger(value)) {
    return `${sign}${BigInt(magnitude).toString()}.${'0'.repeat(FRACTION_DIGITS)}`;
  }

  const scaledByTie = magnitude * TIE_DENOMINATOR;
  if (!Number.isInteger(scaledByTie) || scaledByTie % 2 !== 1) {
    return value.toFixed(FRACTION_DIGITS);
  }

  // Exact tie: |value| * 10^6 = q + 0.5, keep the even neighbour
  let q = (BigInt(scaledByTie) * SCALE) / BigInt(TIE_DENOMINATOR);
  if (q % 2n !== 0n) {
    q += 1n;
  }

  const digits = q.toString().padStart(FRACTION_DIGITS + 1, '0');
  return `${sign}${digits.slice(0, -FRACTION_DIGITS)}.${digits.slice(-FRACTION_DIGITS)}`;
}

/**
 * Format a metric value: integers as plain integers, everything else
 * through formatFixed.
 */
export function formatValue(value: MetricValue): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Number.isInteger(value)) {
    return BigInt(value).toString();
  }
  return formatFixed(value);
}

/**
 * Format a sample rate
 */
export function formatSampleRate(sampleRate: number): string {
  return formatFixed(sampleRate);
}
