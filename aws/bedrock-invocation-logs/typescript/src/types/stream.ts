/**
 * ConverseStream event frames.
 *
 * A streaming invocation is logged as frames, each an object keyed by the stream event
 * it carries. A frame may carry several events (the closing frame usually holds both
 * `messageStop` and `metadata`).
 */

import { z } from 'zod';
import { InvocationMetricsSchema, TokenUsageSchema } from './converse.js';

export const STREAM_EVENT_KEYS = [
  'messageStart',
  'contentBlockStart',
  'contentBlockDelta',
  'contentBlockStop',
  'messageStop',
  'metadata',
] as const;

export type StreamEventKey = (typeof STREAM_EVENT_KEYS)[number];

const contentBlockIndex = z.number().int().nonnegative().optional();

export const StreamFrameSchema = z
  .object({
    messageStart: z.object({ role: z.string() }).passthrough().optional(),
    contentBlockStart: z
      .object({
        contentBlockIndex,
        start: z
          .object({
            toolUse: z
              .object({ toolUseId: z.string(), name: z.string() })
              .passthrough()
              .optional(),
          })
          .passthrough(),
      })
      .passthrough()
      .optional(),
    contentBlockDelta: z
      .object({
        contentBlockIndex,
        delta: z
          .object({
            text: z.string().optional(),
            toolUse: z.object({ input: z.string() }).passthrough().optional(),
            reasoningContent: z
              .object({
                text: z.string().optional(),
                signature: z.string().optional(),
                redactedContent: z.string().optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough(),
      })
      .passthrough()
      .optional(),
    contentBlockStop: z.object({ contentBlockIndex }).passthrough().optional(),
    messageStop: z
      .object({
        stopReason: z.string(),
        additionalModelResponseFields: z.record(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
    metadata: z
      .object({
        usage: TokenUsageSchema.optional(),
        metrics: InvocationMetricsSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type StreamFrame = z.infer<typeof StreamFrameSchema>;

/**
 * Whether a decoded JSON value is an object carrying at least one stream event.
 */
export function hasStreamEvent(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return STREAM_EVENT_KEYS.some((key) => key in value);
}

/**
 * Whether a decoded JSON value carries the given stream event.
 */
export function carriesStreamEvent(value: unknown, key: StreamEventKey): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && key in value;
}
