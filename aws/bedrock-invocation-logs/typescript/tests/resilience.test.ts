/**
 * Retry executor tests
 */

import { describe, it, expect, vi } from 'vitest';
import { throttlingError } from '../src/__mocks__/index.js';
import { FetchFailedError, RetryExecutor, createDefaultRetryConfig } from '../src/index.js';

describe('RetryExecutor', () => {
  it('should grow the delay exponentially up to the cap', () => {
    const executor = new RetryExecutor({ maxAttempts: 10, baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0 });

    expect([1, 2, 3, 4, 5].map((attempt) => executor.calculateDelay(attempt))).toEqual([100, 200, 400, 800, 1000]);
  });

  it('should add jitter in proportion to the delay', () => {
    const executor = new RetryExecutor(createDefaultRetryConfig(), { random: () => 1 });

    expect(executor.calculateDelay(1)).toBe(150);
    expect(executor.calculateDelay(10)).toBe(7500);
  });

  it('should return the first successful result', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const executor = new RetryExecutor(createDefaultRetryConfig(), { sleep, random: () => 0 });
    const operation = vi.fn().mockRejectedValueOnce(throttlingError()).mockResolvedValueOnce('page');
    const onRetry = vi.fn();

    const result = await executor.execute('FilterLogEvents', operation, onRetry);

    expect(result).toBe('page');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(100);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toMatchObject({ attempt: 1, delayMs: 100 });
  });

  it('should make at least one attempt', async () => {
    const executor = new RetryExecutor({ maxAttempts: 0, baseDelayMs: 1, maxDelayMs: 1 });

    await expect(executor.execute('DescribeLogStreams', () => Promise.reject(throttlingError()))).rejects.toMatchObject({
      code: 'FETCH_FAILED',
      attempts: 1,
    });
  });

  it('should wrap the last error in FetchFailedError', async () => {
    const executor = new RetryExecutor({ maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 }, { sleep: async () => {} });

    await expect(executor.execute('FilterLogEvents', () => Promise.reject(throttlingError()))).rejects.toBeInstanceOf(
      FetchFailedError
    );
  });
});
