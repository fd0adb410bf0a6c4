/**
 * Stream reassembly module.
 *
 * @module reassembly
 */

export { StreamGroupBuilder } from './group.js';
export type { StreamGroup, StreamMember } from './group.js';
export { ConverseStreamAccumulator } from './accumulator.js';
export type { BlockProblem } from './accumulator.js';
export { reassembleStream, orderMembers } from './reassembler.js';
export type { ReassemblyResult } from './reassembler.js';
