/**
 * Default configuration values.
 * @module config/defaults
 */

import type { StreamSelection } from '../fetcher/fetcher.js';
import type { LogLevel } from '../observability/logging.js';

/**
 * Log group name Bedrock suggests when invocation logging is enabled in us-east-1.
 */
export const DEFAULT_LOG_GROUP_NAME = 'bedrock-invoke-logging-us-east-1';

export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_LOOKBACK_HOURS = 24;

/**
 * Lookback choices offered to users picking a time window.
 */
export const LOOKBACK_PRESETS_HOURS: readonly number[] = [1, 6, 12, 24, 48, 96];

/**
 * Keeps only Converse and ConverseStream invocations.
 */
export const DEFAULT_FILTER_PATTERN = '{($.operation = "Converse") || ($.operation = "ConverseStream")}';

export const DEFAULT_STREAM_SELECTION: StreamSelection = 'all';

/**
 * Records are released as soon as no earlier line or open stream can precede them.
 */
export const DEFAULT_REORDER_WINDOW_MS = 0;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const MILLISECONDS_PER_HOUR = 3_600_000;
