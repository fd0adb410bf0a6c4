import type { Payload } from '../types/events.js';

/**
 * Wraps a decoded body together with its JSON text.
 *
 * @param raw - The body as it was logged; defaults to the serialized `body`
 */
export function inlinePayload<T>(body: T, raw: string = JSON.stringify(body)): Payload<T> {
  return { kind: 'inline', body, raw };
}

export function s3Payload<T>(location: string): Payload<T> {
  return { kind: 's3', location };
}

export function absentPayload<T>(): Payload<T> {
  return { kind: 'absent' };
}

/**
 * The decoded body of a payload, when it was logged inline.
 */
export function payloadBody<T>(payload: Payload<T>): T | undefined {
  return payload.kind === 'inline' ? payload.body : undefined;
}
