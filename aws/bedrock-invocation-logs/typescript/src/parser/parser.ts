/**
 * Invocation Log Parser
 *
 * Decodes one log line into a `single` or `chunk` invocation event.
 *
 * @module parser
 */

import { z } from 'zod';
import { MalformedRecordError, UnsupportedInvocationKindError } from '../error/categories.js';
import { absentPayload, inlinePayload, s3Payload } from '../record/payload.js';
import {
  ConverseRequestSchema,
  ConverseResponseSchema,
  type ConverseRequest,
  type ConverseResponse,
} from '../types/converse.js';
import type {
  ChunkEvent,
  InvocationOperation,
  LineReference,
  Payload,
  RawEvent,
  RawLogLine,
} from '../types/events.js';
import { carriesStreamEvent, hasStreamEvent } from '../types/stream.js';

/**
 * Outcome of decoding one log line.
 */
export type ParseResult =
  | { readonly ok: true; readonly event: RawEvent }
  | { readonly ok: false; readonly error: MalformedRecordError | UnsupportedInvocationKindError };

export const SUPPORTED_OPERATIONS: readonly InvocationOperation[] = ['Converse', 'ConverseStream'];

/**
 * Fields shared by every model invocation log.
 */
const InvocationLogSchema = z.object({
  requestId: z.string().min(1),
  modelId: z.string().min(1),
  operation: z.string().optional(),
  timestamp: z.string().optional(),
  region: z.string().optional(),
  accountId: z.string().optional(),
  identity: z.object({ arn: z.string().optional() }).passthrough().optional(),
  sequenceNumber: z.number().int().nonnegative().optional(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
  input: z
    .object({
      inputBodyJson: z.unknown(),
      inputBodyS3Path: z.string().optional(),
      inputTokenCount: z.number().optional(),
    })
    .passthrough()
    .optional(),
  output: z
    .object({
      outputBodyJson: z.unknown(),
      outputBodyS3Path: z.string().optional(),
      outputTokenCount: z.number().optional(),
    })
    .passthrough()
    .optional(),
});

type InvocationLog = z.infer<typeof InvocationLogSchema>;

/**
 * Decode one raw log line.
 *
 * Never throws: a line that cannot become an invocation event yields
 * `{ ok: false, error }` with a MalformedRecordError or UnsupportedInvocationKindError.
 *
 * @example
 * ```typescript
 * const result = parseLogLine({ message, timestamp: Date.now() });
 * if (result.ok && result.event.shape === 'chunk') {
 *   console.log(result.event.frames.length);
 * }
 * ```
 */
export function parseLogLine(line: RawLogLine): ParseResult {
  const eventId = line.eventId;

  let decoded: unknown;
  try {
    decoded = JSON.parse(line.message);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return malformed(`Log message is not valid JSON: ${reason}`, eventId);
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return malformed('Log message is not a JSON object', eventId);
  }

  const envelope = InvocationLogSchema.safeParse(decoded);
  if (!envelope.success) {
    return malformed(`Missing invocation fields: ${formatIssues(envelope.error)}`, eventId);
  }
  const log = envelope.data;

  const operation = log.operation;
  if (operation !== undefined && !isSupportedOperation(operation)) {
    return {
      ok: false,
      error: new UnsupportedInvocationKindError(operation, eventId, log.requestId),
    };
  }

  const input = decodeInput(log, eventId);
  if (input instanceof MalformedRecordError) {
    return { ok: false, error: input };
  }

  const base = {
    invocationId: log.requestId,
    modelId: log.modelId,
    region: log.region,
    operation,
    timestamp: resolveTimestamp(log.timestamp, line.timestamp),
    line: lineReference(line),
    input,
    errorCode: log.errorCode,
    errorMessage: log.errorMessage,
    accountId: log.accountId,
    identityArn: log.identity?.arn,
    inputTokenCount: log.input?.inputTokenCount,
    outputTokenCount: log.output?.outputTokenCount,
  };

  const body = log.output?.outputBodyJson;

  if (body !== undefined) {
    if (Array.isArray(body)) {
      if (!body.some(hasStreamEvent)) {
        return malformed('Output body array carries no stream events', eventId, log.requestId);
      }
      return { ok: true, event: chunkEvent(base, log, body) };
    }

    if (isCompleteResponse(body)) {
      const response = ConverseResponseSchema.safeParse(body);
      if (!response.success) {
        return malformed(`Invalid response body: ${formatIssues(response.error)}`, eventId, log.requestId);
      }
      return { ok: true, event: { ...base, shape: 'single', output: inlinePayload(response.data, JSON.stringify(body)) } };
    }

    if (hasStreamEvent(body)) {
      return { ok: true, event: chunkEvent(base, log, [body]) };
    }

    return malformed('Output body is neither a complete response nor a stream frame', eventId, log.requestId);
  }

  if (log.output?.outputBodyS3Path !== undefined) {
    return {
      ok: true,
      event: { ...base, shape: 'single', output: s3Payload<ConverseResponse>(log.output.outputBodyS3Path) },
    };
  }

  if (log.sequenceNumber !== undefined) {
    return { ok: true, event: chunkEvent(base, log, []) };
  }

  if (log.errorCode !== undefined) {
    return { ok: true, event: { ...base, shape: 'single', output: absentPayload<ConverseResponse>() } };
  }

  return malformed('Log has no response, stream frame, or error section', eventId, log.requestId);
}

/**
 * Whether an operation name is one this package normalizes.
 */
export function isSupportedOperation(operation: string): operation is InvocationOperation {
  return SUPPORTED_OPERATIONS.some((supported) => supported === operation);
}

function chunkEvent(
  base: Omit<ChunkEvent, 'shape' | 'sequence' | 'frames' | 'terminal' | 'carriesUsage'>,
  log: InvocationLog,
  frames: readonly unknown[]
): ChunkEvent {
  return {
    ...base,
    shape: 'chunk',
    sequence: log.sequenceNumber,
    frames,
    terminal: log.errorCode !== undefined || frames.some((frame) => carriesStreamEvent(frame, 'messageStop')),
    carriesUsage: frames.some((frame) => carriesStreamEvent(frame, 'metadata')),
  };
}

function decodeInput(log: InvocationLog, eventId?: string): Payload<ConverseRequest> | MalformedRecordError {
  const section = log.input;

  if (section?.inputBodyJson !== undefined) {
    const request = ConverseRequestSchema.safeParse(section.inputBodyJson);
    if (!request.success) {
      return new MalformedRecordError(
        `Invalid request body: ${formatIssues(request.error)} (request ${log.requestId})`,
        eventId
      );
    }
    return inlinePayload(request.data, JSON.stringify(section.inputBodyJson));
  }

  if (section?.inputBodyS3Path !== undefined) {
    return s3Payload(section.inputBodyS3Path);
  }

  return absentPayload();
}

function isCompleteResponse(body: unknown): boolean {
  if (typeof body !== 'object' || body === null || !('output' in body)) {
    return false;
  }
  const output = body.output;
  return typeof output === 'object' && output !== null && 'message' in output;
}

function resolveTimestamp(logged: string | undefined, fallback: number): number {
  if (logged === undefined) {
    return fallback;
  }
  const parsed = Date.parse(logged);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function lineReference(line: RawLogLine): LineReference {
  return {
    message: line.message,
    timestamp: line.timestamp,
    ingestionTime: line.ingestionTime,
    logStreamName: line.logStreamName,
    eventId: line.eventId,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
}

function malformed(reason: string, eventId?: string, invocationId?: string): ParseResult {
  const message = invocationId === undefined ? reason : `${reason} (request ${invocationId})`;
  return { ok: false, error: new MalformedRecordError(message, eventId) };
}
