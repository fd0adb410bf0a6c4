/**
 * Read-only accessors for presenting invocation records.
 *
 * @module views
 */

import { payloadBody } from '../record/payload.js';
import type { ContentBlock, ConverseRequest, ConverseResponse, Message } from '../types/converse.js';
import type { InvocationOperation, Payload } from '../types/events.js';
import type { InvocationRecord } from '../types/record.js';

export interface MessageText {
  readonly role: string;
  readonly text: string;
}

/**
 * The figures shown next to a record in a listing.
 */
export interface RecordSummary {
  readonly modelId: string;
  readonly latencySeconds: number;
  readonly totalTokens: number;
  readonly operation: InvocationOperation;
  /** The invocation ended with an error code */
  readonly failed: boolean;
  readonly incomplete: boolean;
}

/**
 * Text of every system prompt block. Empty when the request was not logged inline.
 */
export function systemTexts(input: Payload<ConverseRequest>): string[] {
  const system = payloadBody(input)?.system ?? [];
  return system.flatMap((block) => (block.text === undefined ? [] : [block.text]));
}

/**
 * Text blocks of the conversation sent to the model, in order.
 */
export function messageTexts(input: Payload<ConverseRequest>): MessageText[] {
  const messages = payloadBody(input)?.messages ?? [];
  return messages.flatMap(textsOf);
}

/**
 * Text blocks of the model's reply.
 */
export function outputTexts(output: Payload<ConverseResponse>): MessageText[] {
  const message = payloadBody(output)?.output.message;
  return message ? textsOf(message) : [];
}

export function summarizeRecord(record: InvocationRecord): RecordSummary {
  const { metadata } = record;
  return {
    modelId: record.modelId,
    latencySeconds: (metadata.latencyMs ?? 0) / 1000,
    totalTokens: metadata.usage?.totalTokens ?? 0,
    operation: record.operation,
    failed: metadata.errorCode !== undefined,
    incomplete: metadata.incomplete,
  };
}

function textsOf(message: Message): MessageText[] {
  return message.content.flatMap((block: ContentBlock) =>
    block.text === undefined ? [] : [{ role: message.role, text: block.text }]
  );
}
