/**
 * Error Handling
 *
 * Error classes and error mapping for the invocation log pipeline.
 */

export { InvocationLogError } from './error.js';
export type { InvocationLogErrorCode } from './error.js';

export {
  ConfigurationError,
  LogStoreError,
  FetchFailedError,
  MalformedRecordError,
  UnsupportedInvocationKindError,
  StreamConsumedError,
} from './categories.js';
export type { LogStoreErrorCode } from './categories.js';

export { mapAwsError } from './mapper.js';
