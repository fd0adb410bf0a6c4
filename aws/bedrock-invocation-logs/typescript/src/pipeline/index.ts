/**
 * Normalization pipeline.
 *
 * @module pipeline
 */

export { fetchAndNormalize } from './pipeline.js';
export type { PipelineDependencies } from './pipeline.js';
export { InvocationStream } from './stream.js';
export type { PipelineSummary, RecordSource } from './stream.js';
export { normalizeLogLines } from './normalize.js';
export type { NormalizeOptions } from './normalize.js';
export { ReorderBuffer } from './reorder.js';
