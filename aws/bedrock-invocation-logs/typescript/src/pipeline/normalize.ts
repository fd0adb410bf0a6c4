/**
 * Turns a sequence of raw log lines into ordered invocation records.
 *
 * @module pipeline/normalize
 */

import { UnsupportedInvocationKindError } from '../error/categories.js';
import { logWarning, NoopLogger, type Logger } from '../observability/logging.js';
import { parseLogLine } from '../parser/parser.js';
import { StreamGroupBuilder } from '../reassembly/group.js';
import { reassembleStream } from '../reassembly/reassembler.js';
import { normalizeSingle } from '../record/build.js';
import type { ChunkEvent, RawLogLine } from '../types/events.js';
import type { InvocationRecord, PipelineWarning } from '../types/record.js';
import { ReorderBuffer } from './reorder.js';

export interface NormalizeOptions {
  /** Region recorded when a log omits its own */
  readonly defaultRegion?: string;
  /**
   * Release records once they are this far behind the newest timestamp seen.
   * When absent, every record is held until the lines are exhausted.
   */
  readonly reorderWindowMs?: number;
  readonly logger?: Logger;
  /** Receives each warning once, as it is raised */
  readonly onWarning?: (warning: PipelineWarning) => void;
}

/**
 * Normalize raw log lines into invocation records.
 *
 * Complete Converse logs become records directly. Stream chunks are grouped by
 * invocation ID and reassembled once their stream is closed and its usage has arrived,
 * or when the lines run out. Lines that cannot be used are reported through
 * `onWarning` and skipped.
 *
 * Records come out in non-decreasing timestamp order when no reorder window is set.
 * With a window, a record that would come out behind an earlier one is still yielded
 * and reported as `OUT_OF_ORDER`.
 */
export async function* normalizeLogLines(
  lines: AsyncIterable<RawLogLine>,
  options: NormalizeOptions = {}
): AsyncGenerator<InvocationRecord, void, undefined> {
  const normalizer = new Normalizer(options);

  for await (const line of lines) {
    normalizer.accept(line);
    yield* normalizer.release();
  }

  yield* normalizer.finish();
}

class Normalizer {
  private readonly defaultRegion?: string;
  private readonly reorderWindowMs?: number;
  private readonly logger: Logger;
  private readonly onWarning?: (warning: PipelineWarning) => void;

  private readonly groups = new Map<string, StreamGroupBuilder>();
  private readonly flushed = new Set<string>();
  private readonly buffer = new ReorderBuffer<InvocationRecord>();
  private arrival = 0;
  private watermark = Number.NEGATIVE_INFINITY;
  private lastReleased = Number.NEGATIVE_INFINITY;

  constructor(options: NormalizeOptions) {
    this.defaultRegion = options.defaultRegion;
    this.reorderWindowMs = options.reorderWindowMs;
    this.logger = options.logger ?? new NoopLogger();
    this.onWarning = options.onWarning;
  }

  accept(line: RawLogLine): void {
    const result = parseLogLine(line);

    if (!result.ok) {
      const error = result.error;
      this.warn(
        error instanceof UnsupportedInvocationKindError
          ? {
              kind: 'UNSUPPORTED_INVOCATION_KIND',
              reason: error.message,
              eventId: error.eventId,
              invocationId: error.invocationId,
            }
          : { kind: 'MALFORMED_RECORD', reason: error.message, eventId: error.eventId }
      );
      return;
    }

    const event = result.event;
    this.watermark = Math.max(this.watermark, event.timestamp);

    if (event.shape === 'single') {
      this.buffer.push(normalizeSingle(event, { defaultRegion: this.defaultRegion }));
      return;
    }

    this.acceptChunk(event);
  }

  /**
   * Records that can no longer be preceded by anything still to come.
   */
  release(): InvocationRecord[] {
    if (this.reorderWindowMs === undefined) {
      return [];
    }

    let threshold = this.watermark - this.reorderWindowMs;
    for (const group of this.groups.values()) {
      threshold = Math.min(threshold, group.startTimestamp);
    }

    return this.checkOrder(this.buffer.drainUpTo(threshold));
  }

  /**
   * Reassembles every open stream and returns all remaining records.
   */
  finish(): InvocationRecord[] {
    for (const group of [...this.groups.values()]) {
      this.flush(group);
    }
    return this.checkOrder(this.buffer.drainAll());
  }

  private acceptChunk(event: ChunkEvent): void {
    const id = event.invocationId;

    if (this.flushed.has(id)) {
      this.warn({
        kind: 'INCONSISTENT_STREAM',
        reason: `Chunk arrived after stream ${id} was reassembled`,
        eventId: event.line.eventId,
        invocationId: id,
      });
      return;
    }

    let group = this.groups.get(id);
    if (!group) {
      group = new StreamGroupBuilder(id, event.modelId);
      this.groups.set(id, group);
    }

    if (!group.add(event, this.arrival++)) {
      this.warn({
        kind: 'INCONSISTENT_STREAM',
        reason: `Chunk names model ${event.modelId} but stream ${id} uses ${group.modelId}`,
        eventId: event.line.eventId,
        invocationId: id,
      });
      return;
    }

    if (group.isReadyToFlush) {
      this.flush(group);
    }
  }

  private flush(group: StreamGroupBuilder): void {
    this.groups.delete(group.invocationId);
    this.flushed.add(group.invocationId);

    const { record, warnings } = reassembleStream(group.build(), { defaultRegion: this.defaultRegion });
    for (const warning of warnings) {
      this.warn(warning);
    }

    if (record.metadata.incomplete) {
      this.logger.debug('Stream has no closing chunk', {
        invocationId: record.invocationId,
        chunks: record.metadata.chunkCount,
      });
    }

    this.buffer.push(record);
  }

  private checkOrder(records: InvocationRecord[]): InvocationRecord[] {
    for (const record of records) {
      if (record.timestamp < this.lastReleased) {
        this.warn({
          kind: 'OUT_OF_ORDER',
          reason: `Record at ${new Date(record.timestamp).toISOString()} released after ${new Date(this.lastReleased).toISOString()}`,
          invocationId: record.invocationId,
        });
      } else {
        this.lastReleased = record.timestamp;
      }
    }
    return records;
  }

  private warn(warning: PipelineWarning): void {
    this.onWarning?.(warning);
    logWarning(this.logger, warning);
  }
}
