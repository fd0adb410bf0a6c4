/**
 * Error codes raised by the invocation log pipeline.
 */
export type InvocationLogErrorCode =
  | 'CONFIGURATION'
  | 'FETCH_FAILED'
  | 'MALFORMED_RECORD'
  | 'UNSUPPORTED_INVOCATION_KIND'
  | 'STREAM_CONSUMED'
  | 'THROTTLED'
  | 'SERVICE_UNAVAILABLE'
  | 'RESOURCE_NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'VALIDATION'
  | 'UNKNOWN';

/**
 * Base error class for all invocation log errors.
 * Carries a machine-readable code, retryability, and optional details.
 */
export class InvocationLogError extends Error {
  /**
   * Error code (e.g. 'FETCH_FAILED', 'MALFORMED_RECORD')
   */
  public readonly code: InvocationLogErrorCode;

  /**
   * Indicates whether the failed operation may succeed if repeated
   */
  public readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: InvocationLogErrorCode;
    message: string;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'InvocationLogError';
    this.code = options.code;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.isRetryable) {
      result += ' [retryable]';
    }
    return result;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
