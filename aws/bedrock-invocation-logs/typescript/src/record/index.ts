export { inlinePayload, s3Payload, absentPayload, payloadBody } from './payload.js';
export {
  UNKNOWN_REGION,
  normalizeSingle,
  requestMetadata,
  resolveRegion,
  resolveOperation,
  freezeRecord,
} from './build.js';
export type { RecordOptions } from './build.js';
