export { ApplicationError } from './application-error.js';
export type { ApplicationErrorOptions } from './application-error.js';
export { BusinessError } from './business-error.js';
export {
  BLANK_MESSAGE_VIOLATION,
  HTTP_STATUS_VIOLATION,
  PAYLOAD_VIOLATION,
  SUCCESS_STATUS_VIOLATION,
  errorArgumentsSchema,
} from './error-arguments.js';
export type { ErrorArguments } from './error-arguments.js';
export { ERROR_KINDS } from './error-kind.js';
export type { ErrorKind } from './error-kind.js';
export { InvalidArgumentError } from './invalid-argument-error.js';
export { SecurityError } from './security-error.js';
export { SystemError } from './system-error.js';
export {
  isApplicationError,
  isBusinessError,
  isSecurityError,
  isSystemError,
  matchErrorKind,
} from './type-guards.js';
export type { ErrorKindHandlers, ErrorKindMap } from './type-guards.js';
