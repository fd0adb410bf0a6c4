/**
 * Log store adapters.
 *
 * @module store
 */

export type { LogStore, LogPage, LogPageRequest } from './store.js';
export { CloudWatchLogStore, createCloudWatchLogsApi } from './cloudwatch.js';
export type {
  CloudWatchLogsApi,
  CloudWatchLogsApiFactory,
  CloudWatchConnectionOptions,
} from './cloudwatch.js';
