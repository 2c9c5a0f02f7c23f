/**
 * Logging for the request pipeline.
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

/** Structured fields attached to a log line. */
export type LogContext = Record<string, unknown>;

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: LogContext;
  error?: Error;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  /** Creates a child logger with additional context. */
  child(context: LogContext): Logger;
}

/**
 * Console logger options.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Prefix text lines with an ISO timestamp. */
  timestamps: boolean;
  /** Emit one JSON object per line instead of text. */
  json: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  timestamps: true,
  json: false,
};

/**
 * Parses a level name, falling back when it is not recognised.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.Info): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return fallback;
  }
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: LogContext;

  constructor(config: Partial<LogConfig> = {}, baseContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = baseContext;
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: { ...this.baseContext, ...context },
      error,
    };

    if (this.config.json) {
      console.log(JSON.stringify(toJsonLine(entry)));
      return;
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(`[${level.toUpperCase()}]`, message);
    if (Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    consoleFor(level)(parts.join(' '));
    if (error) {
      console.error(error);
    }
  }
}

function toJsonLine(entry: LogEntry): Record<string, unknown> {
  return {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp.toISOString(),
    ...entry.context,
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  };
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case LogLevel.Debug:
      return console.debug;
    case LogLevel.Info:
      return console.info;
    case LogLevel.Warn:
      return console.warn;
    case LogLevel.Error:
      return console.error;
  }
}

/**
 * Logger that discards everything.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

/**
 * Logger that keeps entries in memory, for tests.
 *
 * Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly baseContext: LogContext;

  constructor(baseContext: LogContext = {}, entries: LogEntry[] = []) {
    this.baseContext = baseContext;
    this.entries = entries;
  }

  debug(message: string, context?: LogContext): void {
    this.record(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.record(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.record(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.record(LogLevel.Error, message, context, error);
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.entries);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  getMessages(): string[] {
    return this.entries.map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private record(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    this.entries.push({
      level,
      message,
      timestamp: new Date(),
      context: { ...this.baseContext, ...context },
      error,
    });
  }
}

export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}

export function createNoopLogger(): Logger {
  return new NoopLogger();
}
