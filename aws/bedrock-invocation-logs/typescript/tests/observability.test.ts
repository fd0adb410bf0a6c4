/**
 * Logging tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { BASE_TIME } from '../src/__fixtures__/index.js';
import { ConsoleLogger, NoopLogger, formatLogLine, logError, logWarning, parseLogLevel } from '../src/index.js';
import type { LogLevel, Logger } from '../src/index.js';

function recordingLogger(level: LogLevel) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new ConsoleLogger({
    level,
    component: 'test-component',
    sink: (entryLevel, line) => lines.push([entryLevel, line]),
    clock: () => BASE_TIME,
  });
  return { logger, lines };
}

function spyLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  it('should fall back for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('trace', 'warn')).toBe('warn');
    expect(parseLogLevel(undefined, 'warn')).toBe('warn');
  });
});

describe('formatLogLine', () => {
  it('should append defined fields and quote values that need it', () => {
    const line = formatLogLine({
      time: BASE_TIME,
      level: 'warn',
      component: 'test-component',
      message: 'Retrying log store call',
      fields: { operation: 'FilterLogEvents', attempt: 2, error: 'Rate exceeded', requestId: undefined },
    });

    expect(line).toBe(
      '2026-03-01T12:00:00.000Z WARN test-component: Retrying log store call operation=FilterLogEvents attempt=2 error="Rate exceeded"'
    );
  });

  it('should write the message alone without fields', () => {
    expect(formatLogLine({ time: BASE_TIME, level: 'info', component: 'c', message: 'done' })).toBe(
      '2026-03-01T12:00:00.000Z INFO c: done'
    );
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write entries at or above its level', () => {
    const { logger, lines } = recordingLogger('warn');

    logger.error('failed');
    logger.warn('slow', { pages: 3 });
    logger.info('hidden');
    logger.debug('hidden');

    expect(lines).toEqual([
      ['error', '2026-03-01T12:00:00.000Z ERROR test-component: failed'],
      ['warn', '2026-03-01T12:00:00.000Z WARN test-component: slow pages=3'],
    ]);
  });

  it('should write to the console method of the level by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new ConsoleLogger({ clock: () => BASE_TIME }).warn('careful');

    expect(warn).toHaveBeenCalledWith('2026-03-01T12:00:00.000Z WARN bedrock-invocation-logs: careful');
  });

  it('should write nothing through NoopLogger', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new NoopLogger().error('hidden');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('logError', () => {
  it('should log the operation and the error', () => {
    const logger = spyLogger();

    logError(logger, 'FilterLogEvents', new Error('boom'));

    expect(logger.error).toHaveBeenCalledWith('Log store operation failed', {
      operation: 'FilterLogEvents',
      errorName: 'Error',
      errorMessage: 'boom',
    });
  });
});

describe('logWarning', () => {
  it('should log the reason with the warning kind and identifiers', () => {
    const { logger, lines } = recordingLogger('warn');

    logWarning(logger, {
      kind: 'MALFORMED_RECORD',
      reason: 'Log message is not a JSON object',
      eventId: 'evt-bad',
    });

    expect(lines).toEqual([
      [
        'warn',
        '2026-03-01T12:00:00.000Z WARN test-component: Log message is not a JSON object kind=MALFORMED_RECORD eventId=evt-bad',
      ],
    ]);
  });
});
