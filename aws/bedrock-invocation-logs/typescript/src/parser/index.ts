/**
 * Log record parsing
 */

export { parseLogLine, isSupportedOperation, SUPPORTED_OPERATIONS } from './parser.js';
export type { ParseResult } from './parser.js';
