/**
 * Configuration resolution and validation.
 * @module config/validation
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/categories.js';
import { createDefaultRetryConfig } from '../resilience/retry.js';
import type { PipelineConfig, PipelineConfigInput } from './config.js';
import {
  DEFAULT_FILTER_PATTERN,
  DEFAULT_LOG_GROUP_NAME,
  DEFAULT_LOOKBACK_HOURS,
  DEFAULT_REGION,
  DEFAULT_REORDER_WINDOW_MS,
  DEFAULT_STREAM_SELECTION,
  MILLISECONDS_PER_HOUR,
} from './defaults.js';

const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(20),
    baseDelayMs: z.number().int().nonnegative(),
    maxDelayMs: z.number().int().nonnegative(),
    jitterFactor: z.number().min(0).max(1).optional(),
  })
  .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
    message: 'maxDelayMs must not be less than baseDelayMs',
    path: ['maxDelayMs'],
  });

/**
 * Zod schema for resolved configuration values.
 */
const pipelineConfigSchema = z
  .object({
    logGroupName: z.string().min(1).max(512),
    region: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'must be an AWS region such as us-east-1'),
    startTime: z.number().int().nonnegative(),
    endTime: z.number().int().nonnegative(),
    filterPattern: z.string().optional(),
    streamSelection: z.enum(['all', 'latest']),
    logStreamNames: z.array(z.string().min(1)).optional(),
    maxPages: z.number().int().positive().optional(),
    maxEvents: z.number().int().positive().optional(),
    timeBudgetMs: z.number().int().positive().optional(),
    reorderWindowMs: z.number().int().nonnegative(),
    bufferUntilExhausted: z.boolean(),
    retry: retrySchema,
    profile: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  })
  .refine((config) => config.endTime >= config.startTime, {
    message: 'endTime must not be before startTime',
    path: ['endTime'],
  });

/**
 * Validates a resolved configuration.
 *
 * @throws {ConfigurationError} Listing every invalid value
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const result = pipelineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
}

/**
 * Fills defaults into a partial configuration and validates the result.
 *
 * An empty `filterPattern` turns filtering off.
 *
 * @param input - Partial configuration, e.g. from `loadConfigFromEnv`
 * @param now - Current time, used when the window is given as a lookback
 * @throws {ConfigurationError} If a value is invalid
 */
export function resolvePipelineConfig(input: PipelineConfigInput = {}, now: number = Date.now()): PipelineConfig {
  const window =
    input.startTime !== undefined
      ? { startTime: input.startTime, endTime: input.endTime ?? now }
      : windowFromLookback(input.lookbackHours ?? DEFAULT_LOOKBACK_HOURS, input.endTime ?? now);

  const filterPattern = input.filterPattern ?? DEFAULT_FILTER_PATTERN;

  const config: PipelineConfig = {
    logGroupName: input.logGroupName ?? DEFAULT_LOG_GROUP_NAME,
    region: input.region ?? DEFAULT_REGION,
    startTime: window.startTime,
    endTime: window.endTime,
    filterPattern: filterPattern === '' ? undefined : filterPattern,
    streamSelection: input.streamSelection ?? DEFAULT_STREAM_SELECTION,
    logStreamNames: input.logStreamNames,
    maxPages: input.maxPages,
    maxEvents: input.maxEvents,
    timeBudgetMs: input.timeBudgetMs,
    reorderWindowMs: input.reorderWindowMs ?? DEFAULT_REORDER_WINDOW_MS,
    bufferUntilExhausted: input.bufferUntilExhausted ?? false,
    retry: { ...createDefaultRetryConfig(), ...input.retry },
    profile: input.profile,
    endpoint: input.endpoint,
    logLevel: input.logLevel,
  };

  validatePipelineConfig(config);
  return config;
}

/**
 * The window of the given number of hours ending at `now`.
 *
 * @throws {ConfigurationError} If `hours` is not a positive number
 */
export function windowFromLookback(hours: number, now: number = Date.now()): { startTime: number; endTime: number } {
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new ConfigurationError(`Invalid configuration: lookbackHours must be a positive number, got ${hours}`);
  }
  return {
    startTime: Math.round(now - hours * MILLISECONDS_PER_HOUR),
    endTime: now,
  };
}
