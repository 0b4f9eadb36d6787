export {
  ErrorPayloadDraft,
  createErrorPayload,
  draftErrorPayload,
  isErrorCode,
  isErrorPayload,
} from './error-payload.js';
export type { ErrorCode, ErrorPayload, ErrorPayloadInit } from './error-payload.js';
