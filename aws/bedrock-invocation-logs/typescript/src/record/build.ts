/**
 * Builds immutable InvocationRecord values from decoded events.
 */

import type { ConverseRequest } from '../types/converse.js';
import type { InvocationOperation, Payload, RawEvent, SingleEvent } from '../types/events.js';
import type { InvocationMetadata, InvocationRecord } from '../types/record.js';
import { payloadBody } from './payload.js';

/**
 * Region recorded when neither the log nor the caller names one.
 */
export const UNKNOWN_REGION = 'unknown';

export interface RecordOptions {
  /** Region of the queried log group, used when a log omits its own */
  readonly defaultRegion?: string;
}

/**
 * Normalize a complete Converse event.
 */
export function normalizeSingle(event: SingleEvent, options: RecordOptions = {}): InvocationRecord {
  const response = payloadBody(event.output);

  return freezeRecord({
    invocationId: event.invocationId,
    modelId: event.modelId,
    region: resolveRegion(event, options),
    timestamp: event.timestamp,
    operation: resolveOperation(event),
    input: event.input,
    output: event.output,
    metadata: {
      rawShape: 'single',
      incomplete: false,
      stopReason: response?.stopReason,
      usage: response?.usage,
      latencyMs: response?.metrics?.latencyMs,
      ...requestMetadata(event.input),
      errorCode: event.errorCode,
      errorMessage: event.errorMessage,
      inputTokenCount: event.inputTokenCount,
      outputTokenCount: event.outputTokenCount,
      accountId: event.accountId,
      identityArn: event.identityArn,
      logStreamName: event.line.logStreamName,
    },
    rawMessages: [event.line.message],
  });
}

/**
 * Request-side settings shown alongside a record's metadata.
 */
export function requestMetadata(
  input: Payload<ConverseRequest>
): Pick<InvocationMetadata, 'inferenceConfig' | 'additionalModelRequestFields'> {
  const request = payloadBody(input);
  return {
    inferenceConfig: request?.inferenceConfig,
    additionalModelRequestFields: request?.additionalModelRequestFields,
  };
}

export function resolveRegion(event: RawEvent, options: RecordOptions): string {
  return event.region ?? options.defaultRegion ?? UNKNOWN_REGION;
}

export function resolveOperation(event: RawEvent): InvocationOperation {
  if (event.operation !== undefined) {
    return event.operation;
  }
  return event.shape === 'chunk' ? 'ConverseStream' : 'Converse';
}

/**
 * Freezes a record and everything reachable from it, payload bodies included.
 */
export function freezeRecord(record: InvocationRecord): InvocationRecord {
  return deepFreeze(record);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
