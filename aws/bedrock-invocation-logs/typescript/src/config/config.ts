/**
 * Configuration types for the invocation log pipeline.
 * @module config
 */

import type { StreamSelection } from '../fetcher/fetcher.js';
import type { LogLevel } from '../observability/logging.js';
import type { RetryConfig } from '../resilience/types.js';

/**
 * A fully resolved pipeline configuration.
 */
export interface PipelineConfig {
  /** Log group Bedrock writes model invocation logs to */
  readonly logGroupName: string;
  /** Region of the log group */
  readonly region: string;
  /** Start of the time window, milliseconds since the epoch */
  readonly startTime: number;
  /** End of the time window, milliseconds since the epoch */
  readonly endTime: number;
  /** CloudWatch Logs filter pattern; no filtering when absent */
  readonly filterPattern?: string;
  readonly streamSelection: StreamSelection;
  /** Streams to read when `streamSelection` is `all` */
  readonly logStreamNames?: readonly string[];
  readonly maxPages?: number;
  readonly maxEvents?: number;
  /** Wall-clock budget for fetching, in milliseconds */
  readonly timeBudgetMs?: number;
  /** How far behind the newest line timestamp a record must be before it is released */
  readonly reorderWindowMs: number;
  /** Hold every record until the fetch is exhausted, ignoring `reorderWindowMs` */
  readonly bufferUntilExhausted: boolean;
  readonly retry: RetryConfig;
  /** Shared config profile for credentials */
  readonly profile?: string;
  /** Custom CloudWatch Logs endpoint URL */
  readonly endpoint?: string;
  /** Level of the console logger used when none is injected */
  readonly logLevel?: LogLevel;
}

/**
 * A partial configuration. Missing values are filled by `resolvePipelineConfig`.
 *
 * The time window is taken from `startTime`/`endTime` when given, otherwise from
 * `lookbackHours` before `endTime` (or now).
 */
export type PipelineConfigInput = Partial<Omit<PipelineConfig, 'retry'>> & {
  readonly lookbackHours?: number;
  readonly retry?: Partial<RetryConfig>;
};

/**
 * Fluent builder for PipelineConfigInput values.
 *
 * @example
 * ```typescript
 * const config = new PipelineConfigBuilder()
 *   .withRegion('us-west-2')
 *   .withLookbackHours(6)
 *   .withLatestStreamOnly()
 *   .build();
 * ```
 */
export class PipelineConfigBuilder {
  private config: { -readonly [K in keyof PipelineConfigInput]: PipelineConfigInput[K] } = {};

  withLogGroup(logGroupName: string): this {
    this.config.logGroupName = logGroupName;
    return this;
  }

  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets an explicit time window, replacing any lookback.
   */
  withTimeRange(startTime: number, endTime: number): this {
    this.config.startTime = startTime;
    this.config.endTime = endTime;
    this.config.lookbackHours = undefined;
    return this;
  }

  /**
   * Sets the window to the given number of hours ending now.
   */
  withLookbackHours(hours: number): this {
    this.config.lookbackHours = hours;
    this.config.startTime = undefined;
    this.config.endTime = undefined;
    return this;
  }

  withFilterPattern(filterPattern: string): this {
    this.config.filterPattern = filterPattern;
    return this;
  }

  /**
   * Reads only the stream that received the most recent event.
   */
  withLatestStreamOnly(): this {
    this.config.streamSelection = 'latest';
    return this;
  }

  withLogStreams(logStreamNames: readonly string[]): this {
    this.config.streamSelection = 'all';
    this.config.logStreamNames = [...logStreamNames];
    return this;
  }

  withMaxPages(maxPages: number): this {
    this.config.maxPages = maxPages;
    return this;
  }

  withMaxEvents(maxEvents: number): this {
    this.config.maxEvents = maxEvents;
    return this;
  }

  withTimeBudget(timeBudgetMs: number): this {
    this.config.timeBudgetMs = timeBudgetMs;
    return this;
  }

  withReorderWindow(reorderWindowMs: number): this {
    this.config.reorderWindowMs = reorderWindowMs;
    return this;
  }

  /**
   * Reads the whole window before emitting anything, so records come out in
   * timestamp order whatever order the store returns lines in.
   */
  withFullBuffering(): this {
    this.config.bufferUntilExhausted = true;
    return this;
  }

  withRetryConfig(retry: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...retry };
    return this;
  }

  withProfile(profile: string): this {
    this.config.profile = profile;
    return this;
  }

  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  withLogLevel(logLevel: LogLevel): this {
    this.config.logLevel = logLevel;
    return this;
  }

  build(): PipelineConfigInput {
    return { ...this.config };
  }

  static from(config: PipelineConfigInput): PipelineConfigBuilder {
    const builder = new PipelineConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
