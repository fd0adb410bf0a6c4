/**
 * Configuration interfaces for the resilience layer
 */

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of attempts, the first one included */
  maxAttempts: number;
  /** Delay in milliseconds before the first retry */
  baseDelayMs: number;
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays */
  jitterFactor?: number;
}

/**
 * Suspends for the given number of milliseconds
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Called before each retry with the attempt that just failed
 */
export type RetryListener = (event: { attempt: number; delayMs: number; error: unknown }) => void;
