/**
 * Converse API payload types, as they appear in model invocation logs.
 *
 * Every object schema passes unknown keys through, so a decoded body re-serializes to
 * the same JSON the service logged.
 */

import { z } from 'zod';

// ============================================================================
// Usage and metrics
// ============================================================================

export const TokenUsageSchema = z
  .object({
    inputTokens: z.number().int().nonnegative().optional(),
    outputTokens: z.number().int().nonnegative().optional(),
    totalTokens: z.number().int().nonnegative().optional(),
    cacheReadInputTokens: z.number().int().nonnegative().optional(),
    cacheWriteInputTokens: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export type TokenUsage = z.infer<typeof TokenUsageSchema>;

export const InvocationMetricsSchema = z
  .object({
    latencyMs: z.number().nonnegative().optional(),
  })
  .passthrough();

export type InvocationMetrics = z.infer<typeof InvocationMetricsSchema>;

// ============================================================================
// Messages
// ============================================================================

export const ToolUseSchema = z
  .object({
    toolUseId: z.string(),
    name: z.string(),
    input: z.unknown(),
  })
  .passthrough();

export const ReasoningContentSchema = z
  .object({
    reasoningText: z
      .object({
        text: z.string(),
        signature: z.string().optional(),
      })
      .passthrough()
      .optional(),
    redactedContent: z.string().optional(),
  })
  .passthrough();

/**
 * One block of message content. Converse content blocks carry exactly one member;
 * the members this package reads are typed, the rest pass through.
 */
export const ContentBlockSchema = z
  .object({
    text: z.string().optional(),
    toolUse: ToolUseSchema.optional(),
    toolResult: z.record(z.unknown()).optional(),
    reasoningContent: ReasoningContentSchema.optional(),
  })
  .passthrough();

export type ContentBlock = z.infer<typeof ContentBlockSchema>;

export const MessageSchema = z
  .object({
    role: z.string(),
    content: z.array(ContentBlockSchema),
  })
  .passthrough();

export type Message = z.infer<typeof MessageSchema>;

export const SystemBlockSchema = z
  .object({
    text: z.string().optional(),
  })
  .passthrough();

export type SystemBlock = z.infer<typeof SystemBlockSchema>;

// ============================================================================
// Request and response bodies
// ============================================================================

/**
 * `input.inputBodyJson` of a Converse or ConverseStream log.
 */
export const ConverseRequestSchema = z
  .object({
    messages: z.array(MessageSchema).optional(),
    system: z.array(SystemBlockSchema).optional(),
    inferenceConfig: z.record(z.unknown()).optional(),
    additionalModelRequestFields: z.record(z.unknown()).optional(),
    toolConfig: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type ConverseRequest = z.infer<typeof ConverseRequestSchema>;

/**
 * `output.outputBodyJson` of a Converse log, and the shape a reassembled stream takes.
 */
export const ConverseResponseSchema = z
  .object({
    output: z
      .object({
        message: MessageSchema,
      })
      .passthrough(),
    stopReason: z.string().optional(),
    usage: TokenUsageSchema.optional(),
    metrics: InvocationMetricsSchema.optional(),
    additionalModelResponseFields: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type ConverseResponse = z.infer<typeof ConverseResponseSchema>;
