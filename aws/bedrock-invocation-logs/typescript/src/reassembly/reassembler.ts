/**
 * Stream Reassembler
 *
 * Merges the chunks of one ConverseStream invocation into a single record whose
 * output has the shape of a Converse response.
 *
 * @module reassembly/reassembler
 */

import { absentPayload, inlinePayload } from '../record/payload.js';
import { freezeRecord, requestMetadata, UNKNOWN_REGION, type RecordOptions } from '../record/build.js';
import type { ConverseRequest } from '../types/converse.js';
import type { ChunkEvent } from '../types/events.js';
import type { InvocationRecord, PipelineWarning } from '../types/record.js';
import { hasStreamEvent, StreamFrameSchema } from '../types/stream.js';
import { ConverseStreamAccumulator } from './accumulator.js';
import type { StreamGroup, StreamMember } from './group.js';

export interface ReassemblyResult {
  readonly record: InvocationRecord;
  /** Frames skipped or repaired while reassembling */
  readonly warnings: readonly PipelineWarning[];
}

/**
 * Reassemble one stream group into an invocation record.
 *
 * Chunks are put in ingestion order first (see {@link orderMembers}), so the result does
 * not depend on the order of `group.members` when every chunk has a distinct ingestion
 * token or sequence number. A frame that fails validation is skipped and reported; the rest of the group
 * is still used. A group without a terminal chunk yields a record flagged `incomplete`.
 */
export function reassembleStream(group: StreamGroup, options: RecordOptions = {}): ReassemblyResult {
  const warnings: PipelineWarning[] = [];
  const ordered = orderMembers(group.members);
  const accumulator = new ConverseStreamAccumulator();

  for (const { event } of ordered) {
    for (const frame of event.frames) {
      if (!hasStreamEvent(frame)) {
        warnings.push(chunkWarning(group, event, 'frame carries no stream event'));
        continue;
      }

      const parsed = StreamFrameSchema.safeParse(frame);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        warnings.push(chunkWarning(group, event, `invalid stream frame: ${issues.join(', ')}`));
        continue;
      }

      accumulator.add(parsed.data);
    }
  }

  const response = accumulator.build((index, reason) => {
    warnings.push({
      kind: 'MALFORMED_CHUNK',
      reason: `content block ${index}: ${reason}`,
      invocationId: group.invocationId,
    });
  });

  const events = ordered.map((member) => member.event);
  const input = events.find((event) => event.input.kind !== 'absent')?.input ?? absentPayload<ConverseRequest>();

  const record = freezeRecord({
    invocationId: group.invocationId,
    modelId: group.modelId,
    region: firstDefined(events, (event) => event.region) ?? options.defaultRegion ?? UNKNOWN_REGION,
    timestamp: Math.min(...events.map((event) => event.timestamp)),
    operation: firstDefined(events, (event) => event.operation) ?? 'ConverseStream',
    input,
    output: inlinePayload(response),
    metadata: {
      rawShape: 'chunk',
      incomplete: !events.some((event) => event.terminal),
      stopReason: response.stopReason,
      usage: response.usage,
      latencyMs: response.metrics?.latencyMs,
      ...requestMetadata(input),
      errorCode: lastDefined(events, (event) => event.errorCode),
      errorMessage: lastDefined(events, (event) => event.errorMessage),
      inputTokenCount: lastDefined(events, (event) => event.inputTokenCount),
      outputTokenCount: lastDefined(events, (event) => event.outputTokenCount),
      chunkCount: events.length,
      accountId: firstDefined(events, (event) => event.accountId),
      identityArn: firstDefined(events, (event) => event.identityArn),
      logStreamName: firstDefined(events, (event) => event.line.logStreamName),
    },
    rawMessages: events.map((event) => event.line.message),
  });

  return { record, warnings };
}

/**
 * Put stream members in ingestion order: by ingestion time and event ID, then by
 * declared sequence number (undeclared last), then by arrival.
 */
export function orderMembers(members: readonly StreamMember[]): StreamMember[] {
  return [...members].sort(
    (a, b) =>
      compareIngestion(a.event, b.event) ||
      compare(a.event.sequence ?? Number.POSITIVE_INFINITY, b.event.sequence ?? Number.POSITIVE_INFINITY) ||
      compare(a.arrival, b.arrival)
  );
}

function compareIngestion(a: ChunkEvent, b: ChunkEvent): number {
  const byTime = compare(
    a.line.ingestionTime ?? a.line.timestamp,
    b.line.ingestionTime ?? b.line.timestamp
  );
  if (byTime !== 0) {
    return byTime;
  }
  const idA = a.line.eventId ?? '';
  const idB = b.line.eventId ?? '';
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

function compare(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function firstDefined<T>(events: readonly ChunkEvent[], pick: (event: ChunkEvent) => T | undefined): T | undefined {
  for (const event of events) {
    const value = pick(event);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function lastDefined<T>(events: readonly ChunkEvent[], pick: (event: ChunkEvent) => T | undefined): T | undefined {
  return firstDefined([...events].reverse(), pick);
}

function chunkWarning(group: StreamGroup, event: ChunkEvent, reason: string): PipelineWarning {
  const position = event.sequence === undefined ? '' : ` #${event.sequence}`;
  return {
    kind: 'MALFORMED_CHUNK',
    reason: `chunk${position} skipped: ${reason}`,
    eventId: event.line.eventId,
    invocationId: group.invocationId,
  };
}
