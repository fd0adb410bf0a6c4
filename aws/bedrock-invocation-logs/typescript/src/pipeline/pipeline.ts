/**
 * Normalization Pipeline
 *
 * Entry point that wires the store, fetcher and normalizer for one run.
 *
 * @module pipeline
 */

import type { PipelineConfig, PipelineConfigInput } from '../config/config.js';
import { DEFAULT_LOG_LEVEL } from '../config/defaults.js';
import { resolvePipelineConfig } from '../config/validation.js';
import { LogFetcher, type Clock, type LogQuery } from '../fetcher/fetcher.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import type { SleepFn } from '../resilience/types.js';
import { CloudWatchLogStore } from '../store/cloudwatch.js';
import type { LogStore } from '../store/store.js';
import { normalizeLogLines } from './normalize.js';
import { InvocationStream } from './stream.js';

/**
 * Collaborators that can be replaced, mostly for tests.
 */
export interface PipelineDependencies {
  /** Defaults to a CloudWatchLogStore built from the configuration */
  readonly store?: LogStore;
  /** Defaults to a ConsoleLogger at the configured level */
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly sleep?: SleepFn;
  readonly random?: () => number;
}

/**
 * Fetch the invocation logs described by `config` and normalize them.
 *
 * The configuration is resolved and validated immediately; nothing is fetched until
 * the returned stream is iterated. Each call has its own state.
 *
 * @throws {ConfigurationError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const { records, warnings } = await fetchAndNormalize({
 *   logGroupName: 'bedrock-invoke-logging-us-west-2',
 *   region: 'us-west-2',
 *   lookbackHours: 6,
 * }).collect();
 * ```
 */
export function fetchAndNormalize(
  config: PipelineConfigInput = {},
  deps: PipelineDependencies = {}
): InvocationStream {
  const clock = deps.clock ?? Date.now;
  const resolved = resolvePipelineConfig(config, clock());
  const logger = deps.logger ?? new ConsoleLogger({ level: resolved.logLevel ?? DEFAULT_LOG_LEVEL });
  const store = deps.store ?? new CloudWatchLogStore({ profile: resolved.profile, endpoint: resolved.endpoint });

  const fetcher = new LogFetcher(store, {
    retry: resolved.retry,
    logger,
    clock,
    sleep: deps.sleep,
    random: deps.random,
  });

  logger.debug('Normalizing invocation logs', {
    logGroupName: resolved.logGroupName,
    region: resolved.region,
    startTime: new Date(resolved.startTime).toISOString(),
    endTime: new Date(resolved.endTime).toISOString(),
  });

  return new InvocationStream(
    (onWarning) =>
      normalizeLogLines(fetcher.fetch(toQuery(resolved)), {
        defaultRegion: resolved.region,
        reorderWindowMs: resolved.bufferUntilExhausted ? undefined : resolved.reorderWindowMs,
        logger,
        onWarning,
      }),
    logger
  );
}

function toQuery(config: PipelineConfig): LogQuery {
  return {
    logGroupName: config.logGroupName,
    region: config.region,
    startTime: config.startTime,
    endTime: config.endTime,
    filterPattern: config.filterPattern,
    logStreamNames: config.logStreamNames,
    streamSelection: config.streamSelection,
    maxPages: config.maxPages,
    maxEvents: config.maxEvents,
    timeBudgetMs: config.timeBudgetMs,
  };
}
