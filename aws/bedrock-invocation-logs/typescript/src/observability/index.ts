/**
 * Observability
 */

export type { Logger, LogLevel, LogFields, LogSink, ConsoleLoggerOptions } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  formatLogLine,
  parseLogLevel,
  logError,
  logWarning,
} from './logging.js';
