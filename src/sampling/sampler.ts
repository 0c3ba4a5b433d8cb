/**
 * Per-call sampling decision
 *
 * @module sampling/sampler
 */

import type { RandomSource } from '../types/index.js';

/**
 * Decides whether a sampled metric point is sent at all.
 *
 * One uniform draw per call; a point is emitted when the draw is at or
 * below the sample rate. A rate of exactly 1 always emits without drawing;
 * a rate of 0 or below never emits. Other out-of-range rates are not
 * validated.
 */
export class Sampler {
  constructor(private readonly random: RandomSource = Math.random) {}

  shouldEmit(sampleRate: number = 1): boolean {
    if (sampleRate === 1) {
      return true;
    }
    return sampleRate > 0 && this.random() <= sampleRate;
  }
}
