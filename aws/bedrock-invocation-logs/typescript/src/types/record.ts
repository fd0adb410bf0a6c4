/**
 * Normalized invocation records handed to the presentation layer.
 */

import type { ConverseRequest, ConverseResponse, TokenUsage } from './converse.js';
import type { InvocationOperation, Payload, RawShape } from './events.js';

export interface InvocationMetadata {
  /** Wire shape the record was built from */
  readonly rawShape: RawShape;
  /** The stream had no closing frame within the fetch window */
  readonly incomplete: boolean;
  readonly stopReason?: string;
  readonly usage?: TokenUsage;
  readonly latencyMs?: number;
  readonly inferenceConfig?: Readonly<Record<string, unknown>>;
  readonly additionalModelRequestFields?: Readonly<Record<string, unknown>>;
  readonly errorCode?: string;
  readonly errorMessage?: string;
  /** Token counts reported by the log itself, outside the body */
  readonly inputTokenCount?: number;
  readonly outputTokenCount?: number;
  /** Number of chunks a stream was reassembled from */
  readonly chunkCount?: number;
  readonly accountId?: string;
  readonly identityArn?: string;
  readonly logStreamName?: string;
}

export interface InvocationRecord {
  readonly invocationId: string;
  readonly modelId: string;
  readonly region: string;
  /** Request time, milliseconds since the epoch */
  readonly timestamp: number;
  readonly operation: InvocationOperation;
  readonly input: Payload<ConverseRequest>;
  readonly output: Payload<ConverseResponse>;
  readonly metadata: InvocationMetadata;
  /** Logged text of each line the record was built from, in stream order */
  readonly rawMessages: readonly string[];
}

export type WarningKind =
  | 'MALFORMED_RECORD'
  | 'UNSUPPORTED_INVOCATION_KIND'
  | 'MALFORMED_CHUNK'
  | 'INCONSISTENT_STREAM'
  | 'OUT_OF_ORDER';

/**
 * A non-fatal problem met while normalizing, for display as a diagnostic.
 */
export interface PipelineWarning {
  readonly kind: WarningKind;
  readonly reason: string;
  readonly eventId?: string;
  readonly invocationId?: string;
}
