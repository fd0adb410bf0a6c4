/**
 * Maps AWS SDK errors raised by CloudWatch Logs calls to LogStoreError instances.
 */

import { InvocationLogError } from './error.js';
import { LogStoreError, type LogStoreErrorCode } from './categories.js';

/**
 * AWS SDK error interface
 */
interface AwsError extends Error {
  code?: string;
  statusCode?: number;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
  $fault?: 'client' | 'server';
}

/**
 * Type guard to check if error is an AWS SDK error
 */
function isAwsError(error: unknown): error is AwsError {
  return error instanceof Error && ('$metadata' in error || '$fault' in error || 'code' in error);
}

/**
 * Maps an error thrown by the AWS SDK (or anything else) to a LogStoreError.
 * Errors that already belong to this package are returned unchanged.
 */
export function mapAwsError(error: unknown): InvocationLogError {
  if (error instanceof InvocationLogError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new LogStoreError({ code: 'UNKNOWN', message: String(error), cause: error });
  }

  const aws = isAwsError(error) ? error : undefined;
  const errorName = aws?.code ?? error.name;
  const httpStatusCode = aws?.$metadata?.httpStatusCode ?? aws?.statusCode;
  const requestId = aws?.$metadata?.requestId;

  return new LogStoreError({
    code: codeFor(errorName, httpStatusCode, aws?.$fault),
    message: error.message,
    httpStatusCode,
    requestId,
    cause: error,
  });
}

function codeFor(
  errorName: string,
  httpStatusCode: number | undefined,
  fault: 'client' | 'server' | undefined
): LogStoreErrorCode {
  switch (errorName) {
    case 'ThrottlingException':
    case 'Throttling':
    case 'TooManyRequestsException':
    case 'LimitExceededException':
    case 'RequestLimitExceeded':
      return 'THROTTLED';

    case 'ServiceUnavailableException':
    case 'ServiceUnavailable':
    case 'InternalFailure':
    case 'InternalServerError':
    case 'RequestTimeout':
    case 'RequestTimeoutException':
    case 'TimeoutError':
    case 'NetworkingError':
    case 'ECONNRESET':
    case 'ECONNREFUSED':
    case 'ETIMEDOUT':
    case 'EPIPE':
    case 'EAI_AGAIN':
      return 'SERVICE_UNAVAILABLE';

    case 'ResourceNotFoundException':
      return 'RESOURCE_NOT_FOUND';

    case 'AccessDeniedException':
    case 'UnrecognizedClientException':
    case 'ExpiredTokenException':
    case 'CredentialsProviderError':
      return 'ACCESS_DENIED';

    case 'InvalidParameterException':
    case 'ValidationException':
      return 'VALIDATION';
  }

  if (httpStatusCode !== undefined) {
    if (httpStatusCode === 429) {
      return 'THROTTLED';
    }
    if (httpStatusCode >= 500) {
      return 'SERVICE_UNAVAILABLE';
    }
    if (httpStatusCode === 403 || httpStatusCode === 401) {
      return 'ACCESS_DENIED';
    }
    if (httpStatusCode === 404) {
      return 'RESOURCE_NOT_FOUND';
    }
  }

  return fault === 'server' ? 'SERVICE_UNAVAILABLE' : 'UNKNOWN';
}
