/**
 * Resilience
 */

export type { RetryConfig, SleepFn, RetryListener } from './types.js';
export { RetryExecutor, createDefaultRetryConfig } from './retry.js';
