/**
 * Log store contract used by the fetcher.
 */

import type { RawLogLine } from '../types/events.js';

/**
 * One page request against a log group.
 */
export interface LogPageRequest {
  readonly logGroupName: string;
  readonly region: string;
  /** Inclusive lower bound, milliseconds since the epoch */
  readonly startTime: number;
  /** Inclusive upper bound, milliseconds since the epoch */
  readonly endTime: number;
  readonly filterPattern?: string;
  readonly logStreamNames?: readonly string[];
  readonly nextToken?: string;
  /** Maximum number of events the store should return for this page */
  readonly limit?: number;
}

export interface LogPage {
  readonly lines: readonly RawLogLine[];
  /** Absent on the last page */
  readonly nextToken?: string;
}

/**
 * A read-only source of log pages.
 *
 * Implementations throw the store's own errors; the fetcher maps and retries them.
 */
export interface LogStore {
  filterPage(request: LogPageRequest): Promise<LogPage>;

  /**
   * Name of the stream that received the most recent event, or undefined when the
   * group has no streams.
   */
  latestStreamName(request: { logGroupName: string; region: string }): Promise<string | undefined>;
}
