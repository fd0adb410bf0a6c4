export {
  TokenUsageSchema,
  InvocationMetricsSchema,
  ToolUseSchema,
  ReasoningContentSchema,
  ContentBlockSchema,
  MessageSchema,
  SystemBlockSchema,
  ConverseRequestSchema,
  ConverseResponseSchema,
} from './converse.js';
export type {
  TokenUsage,
  InvocationMetrics,
  ContentBlock,
  Message,
  SystemBlock,
  ConverseRequest,
  ConverseResponse,
} from './converse.js';

export { STREAM_EVENT_KEYS, StreamFrameSchema, hasStreamEvent, carriesStreamEvent } from './stream.js';
export type { StreamEventKey, StreamFrame } from './stream.js';

export type {
  RawLogLine,
  LineReference,
  Payload,
  InvocationOperation,
  RawShape,
  SingleEvent,
  ChunkEvent,
  RawEvent,
} from './events.js';

export type { InvocationMetadata, InvocationRecord, WarningKind, PipelineWarning } from './record.js';
