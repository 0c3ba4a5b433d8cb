/**
 * Timer - measures an operation and records it as a timer metric
 */

import type { Tags } from '../types/index.js';
import type { MetricsClient } from './interface.js';

/**
 * Clock returning milliseconds
 */
export type Clock = () => number;

const defaultClock: Clock = () => performance.now();

/**
 * Measures elapsed time from construction and records it once on stop()
 */
export class Timer {
  private readonly startTime: number;
  private stopped = false;
  private recorded = 0;

  constructor(
    private readonly client: Pick<MetricsClient, 'time'>,
    private readonly aspect: string,
    private readonly tags: Tags = [],
    private readonly clock: Clock = defaultClock
  ) {
    this.startTime = clock();
  }

  /**
   * Stop the timer and record the elapsed time, rounded to whole milliseconds.
   * Later calls record nothing and return the first recorded value.
   */
  stop(): number {
    if (this.stopped) {
      return this.recorded;
    }

    this.stopped = true;
    this.recorded = Math.round(this.elapsed());
    this.client.time(this.aspect, this.recorded, this.tags);

    return this.recorded;
  }

  /**
   * Elapsed milliseconds without stopping the timer
   */
  elapsed(): number {
    return this.clock() - this.startTime;
  }

  isStopped(): boolean {
    return this.stopped;
  }
}

/**
 * Run `fn` and record its duration, whether it returns or throws
 */
export async function timed<T>(
  client: Pick<MetricsClient, 'time'>,
  aspect: string,
  fn: () => T | Promise<T>,
  tags?: Tags,
  clock?: Clock
): Promise<T> {
  const timer = new Timer(client, aspect, tags, clock);
  try {
    return await fn();
  } finally {
    timer.stop();
  }
}
