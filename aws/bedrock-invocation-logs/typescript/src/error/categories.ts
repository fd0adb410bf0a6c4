import { InvocationLogError, type InvocationLogErrorCode } from './error.js';

/**
 * Error thrown when a pipeline configuration value is invalid
 */
export class ConfigurationError extends InvocationLogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'CONFIGURATION',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error codes a log store call can fail with
 */
export type LogStoreErrorCode = Extract<
  InvocationLogErrorCode,
  'THROTTLED' | 'SERVICE_UNAVAILABLE' | 'RESOURCE_NOT_FOUND' | 'ACCESS_DENIED' | 'VALIDATION' | 'UNKNOWN'
>;

/**
 * Error raised by a single call to the log store.
 * Throttling and server-side faults are retryable; everything else is not.
 */
export class LogStoreError extends InvocationLogError {
  /**
   * HTTP status code reported by the store, if any
   */
  public readonly httpStatusCode?: number;

  /**
   * Request ID assigned by the store, if any
   */
  public readonly requestId?: string;

  constructor(options: {
    code: LogStoreErrorCode;
    message: string;
    httpStatusCode?: number;
    requestId?: string;
    cause?: unknown;
  }) {
    super({
      code: options.code,
      message: options.message,
      isRetryable: options.code === 'THROTTLED' || options.code === 'SERVICE_UNAVAILABLE',
      details: { httpStatusCode: options.httpStatusCode, requestId: options.requestId },
      cause: options.cause,
    });
    this.name = 'LogStoreError';
    this.httpStatusCode = options.httpStatusCode;
    this.requestId = options.requestId;
  }
}

/**
 * Error thrown when the log store cannot be read: either a non-retryable failure or
 * retryable failures on every allowed attempt. Aborts the whole fetch.
 */
export class FetchFailedError extends InvocationLogError {
  /**
   * Number of attempts made for the failing page
   */
  public readonly attempts: number;

  constructor(message: string, cause: unknown, attempts: number) {
    super({
      code: 'FETCH_FAILED',
      message,
      isRetryable: false,
      details: { attempts },
      cause,
    });
    this.name = 'FetchFailedError';
    this.attempts = attempts;
  }
}

/**
 * A log line that is not JSON or lacks the minimal invocation fields
 */
export class MalformedRecordError extends InvocationLogError {
  /**
   * Store event ID of the offending line, if known
   */
  public readonly eventId?: string;

  constructor(reason: string, eventId?: string) {
    super({
      code: 'MALFORMED_RECORD',
      message: reason,
      details: { eventId },
    });
    this.name = 'MalformedRecordError';
    this.eventId = eventId;
  }
}

/**
 * A recognizable invocation log for an operation outside Converse and ConverseStream
 */
export class UnsupportedInvocationKindError extends InvocationLogError {
  /**
   * The operation named by the log line
   */
  public readonly operation: string;

  /**
   * Store event ID of the offending line, if known
   */
  public readonly eventId?: string;

  /**
   * Request ID of the invocation
   */
  public readonly invocationId?: string;

  constructor(operation: string, eventId?: string, invocationId?: string) {
    super({
      code: 'UNSUPPORTED_INVOCATION_KIND',
      message: `Unsupported invocation kind: ${operation}`,
      details: { operation, eventId, invocationId },
    });
    this.name = 'UnsupportedInvocationKindError';
    this.operation = operation;
    this.eventId = eventId;
    this.invocationId = invocationId;
  }
}

/**
 * Error thrown when an invocation stream is iterated a second time
 */
export class StreamConsumedError extends InvocationLogError {
  constructor() {
    super({
      code: 'STREAM_CONSUMED',
      message: 'Invocation stream has already been consumed; call fetchAndNormalize again',
    });
    this.name = 'StreamConsumedError';
  }
}
