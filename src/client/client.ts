/**
 * StatsD client implementation.
 *
 * Encodes each metric as one StatsD line and sends it as a single
 * datagram. After construction nothing thrown by the encoding or the
 * transport reaches the caller: every failure goes to the configured
 * error handler and the recording call returns normally.
 */

import { applyDefaults, validateConfig } from '../config/index.js';
import type { ResolvedClientConfig } from '../config/index.js';
import {
  ClientClosedError,
  ClientInitializationError,
  SendError,
  SocketCloseError,
  toError,
} from '../errors/index.js';
import { MetricEncoder } from '../protocol/index.js';
import { Sampler } from '../sampling/index.js';
import { UdpTransport } from '../transport/index.js';
import type { DatagramTransport } from '../transport/index.js';
import { MetricType } from '../types/index.js';
import type {
  MetricPoint,
  MetricValue,
  StatsDClientConfig,
  Tags,
} from '../types/index.js';
import type { MetricsClient } from './interface.js';
import { Timer, timed } from './timer.js';

const NO_TAGS: Tags = Object.freeze([]);

/**
 * Lifecycle state of a client
 */
export type ClientState = 'open' | 'closed';

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface StatsDClientOptions {
  /** Transport to use instead of a UDP socket to `host:port` */
  transport?: DatagramTransport;
}

/**
 * Blocking-style StatsD client: one datagram per metric, no buffering.
 *
 * @example
 * ```typescript
 * const statsd = await StatsDClient.create({ host: 'localhost', port: 8125, prefix: 'app' });
 * statsd.increment('requests', ['route:/health']);
 * statsd.time('db.query', 12, 0.5);
 * await statsd.stop();
 * ```
 */
export class StatsDClient implements MetricsClient {
  private readonly encoder: MetricEncoder;
  private readonly sampler: Sampler;
  private state: ClientState = 'open';

  private constructor(
    private readonly config: ResolvedClientConfig,
    private readonly transport: DatagramTransport
  ) {
    this.encoder = new MetricEncoder({
      prefix: config.prefix,
      constantTags: config.constantTags,
    });
    this.sampler = new Sampler(config.random);

    transport.onError((error) => {
      this.reportError(new SendError(error.message, { cause: error }));
    });
  }

  /**
   * Validate the configuration and open a connection to the daemon.
   *
   * @throws ConfigurationError if the configuration is invalid
   * @throws ClientInitializationError if the connection cannot be opened
   */
  static async create(
    config: Partial<StatsDClientConfig> = {},
    options: StatsDClientOptions = {}
  ): Promise<StatsDClient> {
    const resolved = validateConfig(applyDefaults(config));
    const transport =
      options.transport ?? new UdpTransport({ host: resolved.host, port: resolved.port });

    try {
      await transport.connect();
    } catch (error) {
      throw new ClientInitializationError(resolved.host, resolved.port, {
        cause: toError(error),
      });
    }

    resolved.logger.debug('StatsD client connected', {
      host: resolved.host,
      port: resolved.port,
    });

    return new StatsDClient(resolved, transport);
  }

  count(aspect: string, delta: MetricValue, tags?: Tags): void;
  count(aspect: string, delta: MetricValue, sampleRate: number, tags?: Tags): void;
  count(aspect: string, delta: MetricValue, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.COUNTER, aspect, delta, rateOrTags, tags);
  }

  increment(aspect: string, tags?: Tags): void;
  increment(aspect: string, sampleRate: number, tags?: Tags): void;
  increment(aspect: string, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.COUNTER, aspect, 1, rateOrTags, tags);
  }

  /**
   * Equivalent to {@link StatsDClient.increment}
   */
  incrementCounter(aspect: string, tags?: Tags): void;
  incrementCounter(aspect: string, sampleRate: number, tags?: Tags): void;
  incrementCounter(aspect: string, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.COUNTER, aspect, 1, rateOrTags, tags);
  }

  decrement(aspect: string, tags?: Tags): void;
  decrement(aspect: string, sampleRate: number, tags?: Tags): void;
  decrement(aspect: string, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.COUNTER, aspect, -1, rateOrTags, tags);
  }

  /**
   * Equivalent to {@link StatsDClient.decrement}
   */
  decrementCounter(aspect: string, tags?: Tags): void;
  decrementCounter(aspect: string, sampleRate: number, tags?: Tags): void;
  decrementCounter(aspect: string, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.COUNTER, aspect, -1, rateOrTags, tags);
  }

  gauge(aspect: string, value: MetricValue, tags?: Tags): void;
  gauge(aspect: string, value: MetricValue, sampleRate: number, tags?: Tags): void;
  gauge(aspect: string, value: MetricValue, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.GAUGE, aspect, value, rateOrTags, tags);
  }

  /**
   * Equivalent to {@link StatsDClient.gauge}
   */
  recordGaugeValue(aspect: string, value: MetricValue, tags?: Tags): void;
  recordGaugeValue(aspect: string, value: MetricValue, sampleRate: number, tags?: Tags): void;
  recordGaugeValue(
    aspect: string,
    value: MetricValue,
    rateOrTags?: number | Tags,
    tags?: Tags
  ): void {
    this.record(MetricType.GAUGE, aspect, value, rateOrTags, tags);
  }

  time(aspect: string, timeInMs: MetricValue, tags?: Tags): void;
  time(aspect: string, timeInMs: MetricValue, sampleRate: number, tags?: Tags): void;
  time(aspect: string, timeInMs: MetricValue, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.TIMER, aspect, timeInMs, rateOrTags, tags);
  }

  /**
   * Equivalent to {@link StatsDClient.time}
   */
  recordExecutionTime(aspect: string, timeInMs: MetricValue, tags?: Tags): void;
  recordExecutionTime(
    aspect: string,
    timeInMs: MetricValue,
    sampleRate: number,
    tags?: Tags
  ): void;
  recordExecutionTime(
    aspect: string,
    timeInMs: MetricValue,
    rateOrTags?: number | Tags,
    tags?: Tags
  ): void {
    this.record(MetricType.TIMER, aspect, timeInMs, rateOrTags, tags);
  }

  histogram(aspect: string, value: MetricValue, tags?: Tags): void;
  histogram(aspect: string, value: MetricValue, sampleRate: number, tags?: Tags): void;
  histogram(aspect: string, value: MetricValue, rateOrTags?: number | Tags, tags?: Tags): void {
    this.record(MetricType.HISTOGRAM, aspect, value, rateOrTags, tags);
  }

  /**
   * Equivalent to {@link StatsDClient.histogram}
   */
  recordHistogramValue(aspect: string, value: MetricValue, tags?: Tags): void;
  recordHistogramValue(
    aspect: string,
    value: MetricValue,
    sampleRate: number,
    tags?: Tags
  ): void;
  recordHistogramValue(
    aspect: string,
    value: MetricValue,
    rateOrTags?: number | Tags,
    tags?: Tags
  ): void {
    this.record(MetricType.HISTOGRAM, aspect, value, rateOrTags, tags);
  }

  /**
   * Start a timer that records to `aspect` when stopped
   */
  startTimer(aspect: string, tags?: Tags): Timer {
    return new Timer(this, aspect, tags);
  }

  /**
   * Run `fn` and record its duration to `aspect`
   */
  timeAsync<T>(aspect: string, fn: () => T | Promise<T>, tags?: Tags): Promise<T> {
    return timed(this, aspect, fn, tags);
  }

  /**
   * Close the socket. Only the first call releases it; a close failure
   * goes to the error handler.
   */
  async stop(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }

    this.state = 'closed';

    try {
      await this.transport.close();
      this.config.logger.debug('StatsD client stopped', {
        host: this.config.host,
        port: this.config.port,
      });
    } catch (error) {
      this.reportError(new SocketCloseError({ cause: toError(error) }));
    }
  }

  getState(): ClientState {
    return this.state;
  }

  private record(
    type: MetricType,
    name: string,
    value: MetricValue,
    rateOrTags: number | Tags | undefined,
    tags: Tags | undefined
  ): void {
    const sampleRate = typeof rateOrTags === 'number' ? rateOrTags : 1;
    const callTags = (typeof rateOrTags === 'number' ? tags : rateOrTags) ?? NO_TAGS;

    if (!this.sampler.shouldEmit(sampleRate)) {
      return;
    }

    this.send({ name, type, value, sampleRate, tags: callTags });
  }

  private send(point: MetricPoint): void {
    if (this.state === 'closed') {
      this.reportError(new ClientClosedError(point.name));
      return;
    }

    try {
      const payload = Buffer.from(this.encoder.encode(point), 'utf8');
      this.transport.send(payload, (error) => {
        if (error) {
          this.reportError(
            new SendError(error.message, { cause: error, details: { metric: point.name } })
          );
        }
      });
    } catch (error) {
      const cause = toError(error);
      this.reportError(
        new SendError(cause.message, { cause, details: { metric: point.name } })
      );
    }
  }

  private reportError(error: Error): void {
    try {
      this.config.errorHandler(error);
    } catch (handlerError) {
      try {
        this.config.logger.error('StatsD error handler threw', toError(handlerError), {
          originalError: error.message,
        });
      } catch (loggerError) {
        process.emitWarning(toError(loggerError));
      }
    }
  }
}
