/**
 * Raw log lines and the invocation events decoded from them.
 */

import type { ConverseRequest, ConverseResponse } from './converse.js';

/**
 * One log event as returned by the log store.
 */
export interface RawLogLine {
  /** The JSON text of the invocation log */
  readonly message: string;
  /** Event time, milliseconds since the epoch */
  readonly timestamp: number;
  /** Ingestion time, milliseconds since the epoch */
  readonly ingestionTime?: number;
  /** Log stream the event was written to */
  readonly logStreamName?: string;
  /** Store-assigned event ID */
  readonly eventId?: string;
}

/**
 * The line an event was decoded from.
 */
export type LineReference = RawLogLine;

/**
 * Where a request or response body can be found.
 *
 * Bedrock writes bodies above its inline size limit to S3 and logs only their location.
 * An inline `raw` holds the body's JSON text as it was logged.
 */
export type Payload<T> =
  | { readonly kind: 'inline'; readonly body: T; readonly raw: string }
  | { readonly kind: 's3'; readonly location: string }
  | { readonly kind: 'absent' };

export type InvocationOperation = 'Converse' | 'ConverseStream';

export type RawShape = 'single' | 'chunk';

interface RawEventBase {
  /** The invocation's request ID */
  readonly invocationId: string;
  readonly modelId: string;
  readonly region?: string;
  readonly operation?: InvocationOperation;
  /** Request time, milliseconds since the epoch */
  readonly timestamp: number;
  readonly line: LineReference;
  readonly input: Payload<ConverseRequest>;
  readonly errorCode?: string;
  readonly errorMessage?: string;
  readonly accountId?: string;
  readonly identityArn?: string;
  readonly inputTokenCount?: number;
  readonly outputTokenCount?: number;
}

/**
 * A complete Converse call.
 */
export interface SingleEvent extends RawEventBase {
  readonly shape: 'single';
  readonly output: Payload<ConverseResponse>;
}

/**
 * One logged piece of a ConverseStream call.
 */
export interface ChunkEvent extends RawEventBase {
  readonly shape: 'chunk';
  /** Declared position of the chunk within its stream */
  readonly sequence?: number;
  /** Stream frames as logged; validated during reassembly */
  readonly frames: readonly unknown[];
  /** The chunk closes its stream (a messageStop frame or an error) */
  readonly terminal: boolean;
  /** The chunk carries the stream's usage metadata frame */
  readonly carriesUsage: boolean;
}

export type RawEvent = SingleEvent | ChunkEvent;
