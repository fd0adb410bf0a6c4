/**
 * Retry executor with exponential backoff and jitter for log store calls
 */

import { FetchFailedError } from '../error/categories.js';
import { mapAwsError } from '../error/mapper.js';
import type { RetryConfig, RetryListener, SleepFn } from './types.js';

/**
 * Executes log store calls with bounded retries.
 *
 * - Retries errors whose mapped form is retryable (throttling, service unavailable)
 * - Backoff: baseDelayMs * 2^(attempt-1), capped at maxDelayMs, plus jitter
 * - Gives up with FetchFailedError carrying the last underlying error
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(
    config: RetryConfig,
    options: { sleep?: SleepFn; random?: () => number } = {}
  ) {
    this.config = config;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Execute an operation with retry logic
   * @param description - What the operation does, used in the failure message
   * @param operation - The async operation to execute
   * @param onRetry - Invoked before each retry
   * @throws FetchFailedError once the error is not retryable or attempts run out
   */
  async execute<T>(
    description: string,
    operation: () => Promise<T>,
    onRetry?: RetryListener
  ): Promise<T> {
    const maxAttempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const mapped = mapAwsError(error);

        if (!mapped.isRetryable || attempt >= maxAttempts) {
          const reason = mapped.isRetryable ? `gave up after ${attempt} attempts` : 'not retryable';
          throw new FetchFailedError(`${description} failed (${reason}): ${mapped.message}`, mapped, attempt);
        }

        const delayMs = this.calculateDelay(attempt);
        onRetry?.({ attempt, delayMs, error: mapped });
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Calculate the delay for a given retry attempt using exponential backoff with jitter
   * @param attempt - The attempt that just failed (1-indexed)
   * @returns Delay in milliseconds
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay = this.config.baseDelayMs * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // delay * (1 + random * jitterFactor)
    const jitterFactor = this.config.jitterFactor ?? 0.5;
    const jitter = cappedDelay * this.random() * jitterFactor;

    return Math.floor(cappedDelay + jitter);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create the default retry configuration
 *
 * Default values:
 * - maxAttempts: 5
 * - baseDelayMs: 100
 * - maxDelayMs: 5000
 * - jitterFactor: 0.5
 */
export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 5,
    baseDelayMs: 100,
    maxDelayMs: 5000,
    jitterFactor: 0.5,
  };
}
