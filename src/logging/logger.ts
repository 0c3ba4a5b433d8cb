/**
 * Logging for the StatsD client.
 *
 * The client only logs lifecycle events (socket opened, closed) and
 * failures of the error handler itself. Per-metric logging is never done.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Creates a child logger with additional context. */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination for formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Console logger configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to prefix text lines with an ISO timestamp. */
  timestamps: boolean;
  /** Whether to emit one JSON object per line. */
  json: boolean;
  /** Where lines go; defaults to the console method matching the level. */
  sink?: LogSink;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  timestamps: true,
  json: false,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.Debug:
      console.debug(line);
      return;
    case LogLevel.Info:
      console.info(line);
      return;
    case LogLevel.Warn:
      console.warn(line);
      return;
    case LogLevel.Error:
      console.error(line);
      return;
  }
};

/**
 * Console logger with level filtering and text or JSON output.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly sink: LogSink;

  constructor(
    config: Partial<LogConfig> = {},
    private readonly baseContext: Record<string, unknown> = {}
  ) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.sink = this.config.sink ?? consoleSink;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const merged = { ...this.baseContext, ...context };
    const line = this.config.json
      ? this.formatJson(level, message, merged, error)
      : this.formatText(level, message, merged, error);

    this.sink(level, line);
  }

  private formatJson(
    level: LogLevel,
    message: string,
    context: Record<string, unknown>,
    error?: Error
  ): string {
    return JSON.stringify({
      level,
      message,
      ...(this.config.timestamps ? { timestamp: new Date().toISOString() } : {}),
      ...context,
      ...(error && {
        error: { name: error.name, message: error.message },
      }),
    });
  }

  private formatText(
    level: LogLevel,
    message: string,
    context: Record<string, unknown>,
    error?: Error
  ): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`, message);

    if (Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    if (error) {
      parts.push(`${error.name}: ${error.message}`);
    }

    return parts.join(' ');
  }
}

/**
 * Logger that discards all messages.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}

export function createNoopLogger(): Logger {
  return new NoopLogger();
}
