/**
 * Log Fetcher
 *
 * Lazily pages through a log group's events for a time window.
 *
 * @module fetcher
 */

import { logError, NoopLogger, type Logger } from '../observability/logging.js';
import { createDefaultRetryConfig, RetryExecutor } from '../resilience/retry.js';
import type { RetryConfig, SleepFn } from '../resilience/types.js';
import type { LogStore } from '../store/store.js';
import type { RawLogLine } from '../types/events.js';

/**
 * Largest page CloudWatch Logs returns from FilterLogEvents.
 */
export const MAX_PAGE_EVENTS = 10_000;

/**
 * Which log streams of the group are read.
 * - `all`: every stream, or the streams named by `logStreamNames`
 * - `latest`: only the stream that received the most recent event
 */
export type StreamSelection = 'all' | 'latest';

/**
 * Returns the current time in milliseconds since the epoch.
 */
export type Clock = () => number;

export interface LogQuery {
  readonly logGroupName: string;
  readonly region: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly filterPattern?: string;
  readonly logStreamNames?: readonly string[];
  readonly streamSelection?: StreamSelection;
  /** Stop after this many pages */
  readonly maxPages?: number;
  /** Stop after this many lines */
  readonly maxEvents?: number;
  /** Request no further page once this much time has passed since the first request */
  readonly timeBudgetMs?: number;
}

export interface LogFetcherOptions {
  readonly retry?: RetryConfig;
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly sleep?: SleepFn;
  readonly random?: () => number;
}

/**
 * Pages through a log store one request at a time.
 *
 * Nothing is requested until the consumer pulls, and nothing more once it stops.
 * Every page request goes through a RetryExecutor; a store failure that survives it
 * surfaces from the generator as FetchFailedError.
 *
 * @example
 * ```typescript
 * const fetcher = new LogFetcher(new CloudWatchLogStore());
 * for await (const line of fetcher.fetch({ logGroupName, region, startTime, endTime })) {
 *   console.log(line.eventId);
 * }
 * ```
 */
export class LogFetcher {
  private readonly store: LogStore;
  private readonly retry: RetryExecutor;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(store: LogStore, options: LogFetcherOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? new NoopLogger();
    this.clock = options.clock ?? Date.now;
    this.retry = new RetryExecutor(options.retry ?? createDefaultRetryConfig(), {
      sleep: options.sleep,
      random: options.random,
    });
  }

  /**
   * Yield the lines of every page for the query, in store order.
   *
   * Each call issues a fresh query; results are never cached.
   *
   * @throws FetchFailedError when a page cannot be read
   */
  async *fetch(query: LogQuery): AsyncGenerator<RawLogLine, void, undefined> {
    if (query.endTime < query.startTime) {
      return;
    }

    const started = this.clock();
    let logStreamNames = query.logStreamNames;

    if (query.streamSelection === 'latest') {
      const latest = await this.call('DescribeLogStreams', () =>
        this.store.latestStreamName({ logGroupName: query.logGroupName, region: query.region })
      );
      if (latest === undefined) {
        this.logger.info('Log group has no streams', { logGroupName: query.logGroupName });
        return;
      }
      logStreamNames = [latest];
    }

    let nextToken: string | undefined;
    let pages = 0;
    let emitted = 0;

    for (;;) {
      if (query.maxPages !== undefined && pages >= query.maxPages) {
        break;
      }
      if (query.maxEvents !== undefined && emitted >= query.maxEvents) {
        break;
      }
      if (query.timeBudgetMs !== undefined && pages > 0 && this.clock() - started >= query.timeBudgetMs) {
        this.logger.info('Fetch time budget exhausted', { pages, events: emitted });
        break;
      }

      const limit =
        query.maxEvents === undefined ? undefined : Math.min(query.maxEvents - emitted, MAX_PAGE_EVENTS);
      const token = nextToken;

      const page = await this.call('FilterLogEvents', () =>
        this.store.filterPage({
          logGroupName: query.logGroupName,
          region: query.region,
          startTime: query.startTime,
          endTime: query.endTime,
          filterPattern: query.filterPattern,
          logStreamNames,
          nextToken: token,
          limit,
        })
      );
      pages++;

      this.logger.debug('Fetched log page', {
        page: pages,
        events: page.lines.length,
        hasMore: page.nextToken !== undefined,
      });

      for (const line of page.lines) {
        if (query.maxEvents !== undefined && emitted >= query.maxEvents) {
          return;
        }
        emitted++;
        yield line;
      }

      if (page.nextToken === undefined) {
        break;
      }
      if (page.nextToken === nextToken) {
        this.logger.warn('Log store returned the token it was given; stopping', { page: pages });
        break;
      }
      nextToken = page.nextToken;
    }
  }

  private async call<T>(description: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await this.retry.execute(description, operation, ({ attempt, delayMs, error }) => {
        this.logger.warn('Retrying log store call', {
          operation: description,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    } catch (error) {
      if (error instanceof Error) {
        logError(this.logger, description, error);
      }
      throw error;
    }
  }
}
