/**
 * Builders for invocation log lines used across tests.
 *
 * Logs follow the layout Bedrock writes to CloudWatch Logs: a JSON object with
 * `requestId`, `modelId`, `operation`, an ISO `timestamp`, and `input` / `output`
 * sections holding the request and response bodies.
 */

import type { RawLogLine } from '../types/events.js';

export const BASE_TIME = Date.parse('2026-03-01T12:00:00.000Z');

export const MODEL_ID = 'anthropic.claude-3-haiku-20240307-v1:0';

export interface ConverseLogOptions {
  readonly requestId: string;
  readonly at: number;
  readonly modelId?: string;
  readonly userText?: string;
  readonly systemText?: string;
  readonly replyText?: string;
  readonly stopReason?: string;
  readonly usage?: { inputTokens: number; outputTokens: number; totalTokens: number };
  readonly latencyMs?: number;
  readonly region?: string;
  readonly eventId?: string;
}

/**
 * A decoded Converse request body.
 */
export function requestBody(userText: string, systemText?: string): Record<string, unknown> {
  const body: Record<string, unknown> = {
    messages: [{ role: 'user', content: [{ text: userText }] }],
    inferenceConfig: { maxTokens: 512, temperature: 0.5 },
  };
  if (systemText !== undefined) {
    body.system = [{ text: systemText }];
  }
  return body;
}

/**
 * The decoded log object of a complete Converse call.
 */
export function converseLog(options: ConverseLogOptions): Record<string, unknown> {
  return {
    schemaType: 'ModelInvocationLog',
    schemaVersion: '1.0',
    timestamp: new Date(options.at).toISOString(),
    accountId: '111122223333',
    identity: { arn: 'arn:aws:iam::111122223333:user/test-user' },
    region: options.region ?? 'us-east-1',
    requestId: options.requestId,
    operation: 'Converse',
    modelId: options.modelId ?? MODEL_ID,
    input: {
      inputContentType: 'application/json',
      inputBodyJson: requestBody(options.userText ?? 'Hello', options.systemText),
      inputTokenCount: options.usage?.inputTokens ?? 10,
    },
    output: {
      outputContentType: 'application/json',
      outputBodyJson: {
        output: {
          message: { role: 'assistant', content: [{ text: options.replyText ?? 'Hi there' }] },
        },
        stopReason: options.stopReason ?? 'end_turn',
        usage: options.usage ?? { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
        metrics: { latencyMs: options.latencyMs ?? 420 },
      },
      outputTokenCount: options.usage?.outputTokens ?? 5,
    },
  };
}

export function converseLine(options: ConverseLogOptions): RawLogLine {
  return rawLine(converseLog(options), options.at, { eventId: options.eventId ?? `evt-${options.requestId}` });
}

export interface ChunkLogOptions {
  readonly requestId: string;
  readonly at: number;
  readonly frames?: readonly unknown[];
  readonly sequence?: number;
  readonly modelId?: string;
  /** Include the request body; the first chunk of a stream usually does */
  readonly withInput?: boolean;
  readonly errorCode?: string;
  readonly eventId?: string;
  readonly ingestionTime?: number;
  readonly region?: string;
}

/**
 * The decoded log object of one ConverseStream chunk.
 *
 * A single frame is logged as an object, several as an array.
 */
export function chunkLog(options: ChunkLogOptions): Record<string, unknown> {
  const log: Record<string, unknown> = {
    timestamp: new Date(options.at).toISOString(),
    region: options.region ?? 'us-east-1',
    requestId: options.requestId,
    operation: 'ConverseStream',
    modelId: options.modelId ?? MODEL_ID,
  };

  if (options.sequence !== undefined) {
    log.sequenceNumber = options.sequence;
  }
  if (options.withInput) {
    log.input = { inputBodyJson: requestBody('Tell me a story') };
  }

  const frames = options.frames ?? [];
  if (frames.length === 1) {
    log.output = { outputBodyJson: frames[0] };
  } else if (frames.length > 1) {
    log.output = { outputBodyJson: frames };
  }

  if (options.errorCode !== undefined) {
    log.errorCode = options.errorCode;
    log.errorMessage = 'The stream was interrupted';
  }

  return log;
}

export function chunkLine(options: ChunkLogOptions): RawLogLine {
  return rawLine(chunkLog(options), options.at, {
    eventId: options.eventId ?? `evt-${options.requestId}-${options.sequence ?? 'x'}`,
    ingestionTime: options.ingestionTime,
  });
}

/**
 * Wraps any value as a log line carrying its JSON text.
 */
export function rawLine(
  log: unknown,
  at: number,
  extras: { eventId?: string; ingestionTime?: number; logStreamName?: string } = {}
): RawLogLine {
  return {
    message: JSON.stringify(log),
    timestamp: at,
    ingestionTime: extras.ingestionTime ?? at + 500,
    logStreamName: extras.logStreamName ?? 'aws/bedrock/modelinvocations',
    eventId: extras.eventId,
  };
}

// ============================================================================
// Stream frames
// ============================================================================

export function messageStartFrame(role = 'assistant'): Record<string, unknown> {
  return { messageStart: { role } };
}

export function textDeltaFrame(text: string, contentBlockIndex = 0): Record<string, unknown> {
  return { contentBlockDelta: { contentBlockIndex, delta: { text } } };
}

export function toolUseStartFrame(contentBlockIndex: number, toolUseId: string, name: string): Record<string, unknown> {
  return { contentBlockStart: { contentBlockIndex, start: { toolUse: { toolUseId, name } } } };
}

export function toolUseDeltaFrame(contentBlockIndex: number, input: string): Record<string, unknown> {
  return { contentBlockDelta: { contentBlockIndex, delta: { toolUse: { input } } } };
}

export function reasoningDeltaFrame(
  delta: { text?: string; signature?: string },
  contentBlockIndex = 0
): Record<string, unknown> {
  return { contentBlockDelta: { contentBlockIndex, delta: { reasoningContent: delta } } };
}

export function blockStopFrame(contentBlockIndex = 0): Record<string, unknown> {
  return { contentBlockStop: { contentBlockIndex } };
}

export function messageStopFrame(stopReason = 'end_turn'): Record<string, unknown> {
  return { messageStop: { stopReason } };
}

export function metadataFrame(
  usage = { inputTokens: 12, outputTokens: 30, totalTokens: 42 },
  latencyMs = 900
): Record<string, unknown> {
  return { metadata: { usage, metrics: { latencyMs } } };
}
