/**
 * Client module exports
 */

export type { MetricsClient } from './interface.js';
export { StatsDClient } from './client.js';
export type { ClientState, StatsDClientOptions } from './client.js';
export { createStatsDClient, createStatsDClientFromEnvironment } from './factory.js';
export { Timer, timed } from './timer.js';
export type { Clock } from './timer.js';
