/**
 * Log fetching.
 *
 * @module fetcher
 */

export { LogFetcher, MAX_PAGE_EVENTS } from './fetcher.js';
export type { LogQuery, LogFetcherOptions, StreamSelection, Clock } from './fetcher.js';
