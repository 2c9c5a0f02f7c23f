/**
 * Observability exports.
 */

export {
  LogLevel,
  DEFAULT_LOG_CONFIG,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  parseLogLevel,
  createLogger,
  createNoopLogger,
} from './logging.js';
export type { Logger, LogEntry, LogConfig, LogContext } from './logging.js';

export { NetworkLogger, prettyJson, prettyBody } from './network-logger.js';
export type { RequestLogEvent, ResponseLogEvent, NetworkLoggerOptions } from './network-logger.js';
