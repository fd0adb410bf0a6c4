/**
 * Logging for the invocation log pipeline.
 *
 * An entry is a message plus flat fields, written as one line:
 * `<ISO time> <LEVEL> <component>: <message> key=value ...`
 */

import type { PipelineWarning } from '../types/record.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Values attached to an entry. Undefined fields are left out of the line.
 */
export type LogFields = Readonly<Record<string, string | number | boolean | undefined>>;

export interface Logger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
}

/**
 * Levels from most to least severe.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Receives each formatted line.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface ConsoleLoggerOptions {
  /** Least severe level written; defaults to info */
  readonly level?: LogLevel;
  readonly component?: string;
  /** Defaults to the console method matching the level */
  readonly sink?: LogSink;
  readonly clock?: () => number;
}

/**
 * Writes level-filtered entries to the console, one line each.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ level: 'debug' });
 * logger.warn('Retrying log store call', { operation: 'FilterLogEvents', attempt: 2 });
 * // 2026-03-01T12:00:00.000Z WARN bedrock-invocation-logs: Retrying log store call operation=FilterLogEvents attempt=2
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly component: string;
  private readonly sink: LogSink;
  private readonly clock: () => number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    this.component = options.component ?? 'bedrock-invocation-logs';
    this.sink = options.sink ?? writeToConsole;
    this.clock = options.clock ?? Date.now;
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVELS.indexOf(level) > this.threshold) {
      return;
    }
    this.sink(
      level,
      formatLogLine({ time: this.clock(), level, component: this.component, message, fields })
    );
  }
}

/**
 * Logger that discards every entry.
 */
export class NoopLogger implements Logger {
  error(_message: string, _fields?: LogFields): void {}

  warn(_message: string, _fields?: LogFields): void {}

  info(_message: string, _fields?: LogFields): void {}

  debug(_message: string, _fields?: LogFields): void {}
}

/**
 * Formats one entry. String values containing spaces, quotes or `=` are JSON-quoted.
 */
export function formatLogLine(entry: {
  time: number;
  level: LogLevel;
  component: string;
  message: string;
  fields?: LogFields;
}): string {
  const head = `${new Date(entry.time).toISOString()} ${entry.level.toUpperCase()} ${entry.component}: ${entry.message}`;
  const pairs = Object.entries(entry.fields ?? {}).flatMap(([key, value]) =>
    value === undefined ? [] : [`${key}=${formatValue(value)}`]
  );
  return pairs.length === 0 ? head : `${head} ${pairs.join(' ')}`;
}

/**
 * Parses a level name, falling back to `fallback` for anything unrecognized.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Logs a failed log store call.
 */
export function logError(logger: Logger, operation: string, error: Error): void {
  logger.error('Log store operation failed', {
    operation,
    errorName: error.name,
    errorMessage: error.message,
  });
}

/**
 * Logs a pipeline warning with its kind and identifiers as fields.
 */
export function logWarning(logger: Logger, warning: PipelineWarning): void {
  logger.warn(warning.reason, {
    kind: warning.kind,
    eventId: warning.eventId,
    invocationId: warning.invocationId,
  });
}

function formatValue(value: string | number | boolean): string {
  if (typeof value !== 'string') {
    return String(value);
  }
  return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'debug':
      console.debug(line);
      break;
  }
}
