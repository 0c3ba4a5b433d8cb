/**
 * StatsD datagram client
 *
 * Sends counters, gauges, timers and histograms to a StatsD daemon, one UDP
 * datagram per metric, with optional prefix, constant tags and per-call
 * sampling. Failures after construction are routed to an error handler and
 * never thrown to the caller.
 *
 * @example
 * ```typescript
 * import { StatsDClient, createLoggingErrorHandler, createLogger } from 'statsd-datagram-client';
 *
 * const statsd = await StatsDClient.create({
 *   host: 'localhost',
 *   port: 8125,
 *   prefix: 'checkout',
 *   constantTags: ['env:prod'],
 *   errorHandler: createLoggingErrorHandler(createLogger()),
 * });
 *
 * statsd.increment('orders', ['region:eu']);   // checkout.orders:1|c|#env:prod,region:eu
 * statsd.gauge('queue.depth', 12.5);           // checkout.queue.depth:12.500000|g|#env:prod
 * statsd.time('payment', 84, 0.25);            // checkout.payment:84|ms|@0.250000|#env:prod
 *
 * await statsd.stop();
 * ```
 *
 * @module statsd-datagram-client
 */

// Client
export {
  StatsDClient,
  createStatsDClient,
  createStatsDClientFromEnvironment,
  Timer,
  timed,
} from './client/index.js';
export type {
  MetricsClient,
  ClientState,
  StatsDClientOptions,
  Clock,
} from './client/index.js';

// Types
export { MetricType, METRIC_TYPE_CODES } from './types/index.js';
export type {
  MetricPoint,
  MetricValue,
  Tags,
  ErrorHandler,
  RandomSource,
  StatsDClientConfig,
} from './types/index.js';

// Configuration
export {
  DEFAULT_CONFIG,
  DEFAULT_HOST,
  DEFAULT_PORT,
  applyDefaults,
  validateConfig,
  configFromEnvironment,
} from './config/index.js';
export type { ResolvedClientConfig } from './config/index.js';

// Errors
export {
  StatsDError,
  isStatsDError,
  isErrorCategory,
  toError,
  ConfigurationError,
  ClientInitializationError,
  SendError,
  SocketCloseError,
  ClientClosedError,
} from './errors/index.js';
export type { ErrorCategory } from './errors/index.js';

// Wire protocol
export {
  encodeMetric,
  MetricEncoder,
  formatFixed,
  formatValue,
  formatSampleRate,
  formatTagSuffix,
  formatPrefix,
} from './protocol/index.js';
export type { EncoderOptions } from './protocol/index.js';

// Sampling
export { Sampler } from './sampling/index.js';

// Transport
export { UdpTransport } from './transport/index.js';
export type {
  DatagramTransport,
  SendCallback,
  TransportErrorListener,
  UdpTransportOptions,
} from './transport/index.js';

// Logging
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  createLogger,
  createNoopLogger,
  createNoopErrorHandler,
  createLoggingErrorHandler,
} from './logging/index.js';
export type { Logger, LogConfig, LogSink } from './logging/index.js';
