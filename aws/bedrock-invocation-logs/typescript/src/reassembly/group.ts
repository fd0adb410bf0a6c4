/**
 * Per-invocation accumulation of stream chunks.
 */

import type { ChunkEvent } from '../types/events.js';

/**
 * A chunk together with its position in fetch order.
 */
export interface StreamMember {
  readonly event: ChunkEvent;
  readonly arrival: number;
}

/**
 * The chunks of one streaming invocation. All members share the invocation ID and
 * the model ID.
 */
export interface StreamGroup {
  readonly invocationId: string;
  readonly modelId: string;
  readonly members: readonly StreamMember[];
}

/**
 * Collects the chunks of one streaming invocation while lines are being read.
 *
 * A group is closed once a terminal chunk (messageStop or error) arrives, and ready
 * to flush once it is closed and its usage metadata has also arrived.
 */
export class StreamGroupBuilder {
  readonly invocationId: string;
  readonly modelId: string;
  private readonly members: StreamMember[] = [];
  private closed = false;
  private usageSeen = false;
  private earliest = Number.POSITIVE_INFINITY;

  constructor(invocationId: string, modelId: string) {
    this.invocationId = invocationId;
    this.modelId = modelId;
  }

  /**
   * Adds a chunk. Returns false, leaving the group unchanged, when the chunk belongs
   * to another invocation or names another model.
   */
  add(event: ChunkEvent, arrival: number): boolean {
    if (event.invocationId !== this.invocationId || event.modelId !== this.modelId) {
      return false;
    }

    this.members.push({ event, arrival });
    this.closed ||= event.terminal;
    this.usageSeen ||= event.carriesUsage;
    this.earliest = Math.min(this.earliest, event.timestamp);
    return true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isReadyToFlush(): boolean {
    return this.closed && this.usageSeen;
  }

  /**
   * Earliest request timestamp among the members; the timestamp the record will carry.
   */
  get startTimestamp(): number {
    return this.earliest;
  }

  get size(): number {
    return this.members.length;
  }

  build(): StreamGroup {
    return {
      invocationId: this.invocationId,
      modelId: this.modelId,
      members: [...this.members],
    };
  }
}
