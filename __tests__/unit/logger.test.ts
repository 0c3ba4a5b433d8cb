/**
 * Tests for ConsoleLogger and the logging error handler.
 */

import { describe, it, expect } from 'vitest';
import { SendError } from '../../src/errors/index.js';
import {
  ConsoleLogger,
  LogLevel,
  NoopLogger,
  createLoggingErrorHandler,
} from '../../src/logging/index.js';
import type { LogSink } from '../../src/logging/index.js';

function capture(): { sink: LogSink; lines: Array<[LogLevel, string]> } {
  const lines: Array<[LogLevel, string]> = [];
  return {
    sink: (level, line) => {
      lines.push([level, line]);
    },
    lines,
  };
}

describe('ConsoleLogger', () => {
  it('should drop messages below the configured level', () => {
    const { sink, lines } = capture();
    const logger = new ConsoleLogger({ level: LogLevel.Info, timestamps: false, sink });

    logger.debug('hidden');
    logger.info('hello', { a: 1 });

    expect(lines).toEqual([[LogLevel.Info, '[INFO] hello {"a":1}']]);
  });

  it('should append the error to text lines', () => {
    const { sink, lines } = capture();
    const logger = new ConsoleLogger({ timestamps: false, sink });

    logger.error('failed', new Error('boom'));

    expect(lines).toEqual([[LogLevel.Error, '[ERROR] failed Error: boom']]);
  });

  it('should write JSON lines', () => {
    const { sink, lines } = capture();
    const logger = new ConsoleLogger({ json: true, timestamps: false, sink });

    logger.info('sent', { k: 'v' });

    expect(lines).toEqual([[LogLevel.Info, '{"level":"info","message":"sent","k":"v"}']]);
  });

  it('should merge child context', () => {
    const { sink, lines } = capture();
    const logger = new ConsoleLogger({ timestamps: false, sink }).child({ component: 'statsd' });

    logger.warn('slow');

    expect(lines).toEqual([[LogLevel.Warn, '[WARN] slow {"component":"statsd"}']]);
  });
});

describe('NoopLogger', () => {
  it('should return itself as child', () => {
    const logger = new NoopLogger();
    expect(logger.child()).toBe(logger);
  });
});

describe('createLoggingErrorHandler', () => {
  it('should log each failure at warn level', () => {
    const { sink, lines } = capture();
    const handler = createLoggingErrorHandler(new ConsoleLogger({ timestamps: false, sink }));

    handler(new SendError('EMSGSIZE'));

    expect(lines).toEqual([
      [
        LogLevel.Warn,
        '[WARN] StatsD metric failure {"error":"SendError","message":"Failed to send metric: EMSGSIZE"}',
      ],
    ]);
  });
});
