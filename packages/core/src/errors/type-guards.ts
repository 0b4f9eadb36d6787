import { ApplicationError } from './application-error.js';
import { BusinessError } from './business-error.js';
import type { ErrorKind } from './error-kind.js';
import { SecurityError } from './security-error.js';
import { SystemError } from './system-error.js';

export interface ErrorKindMap {
  application: ApplicationError;
  business: BusinessError;
  security: SecurityError;
  system: SystemError;
}

export type ErrorKindHandlers<R> = { [K in ErrorKind]: (error: ErrorKindMap[K]) => R };

export function isApplicationError(value: unknown): value is ApplicationError {
  return value instanceof ApplicationError;
}

export function isBusinessError(value: unknown): value is BusinessError {
  return value instanceof BusinessError;
}

export function isSecurityError(value: unknown): value is SecurityError {
  return value instanceof SecurityError;
}

export function isSystemError(value: unknown): value is SystemError {
  return value instanceof SystemError;
}

/**
 * Dispatch on the error variant. Variants are checked before the base class, so a
 * subclass of BusinessError still reaches the `business` handler.
 *
 * ```ts
 * const status = matchErrorKind(error, {
 *   business: (e) => e.httpStatus,
 *   security: () => 403,
 *   system: () => 503,
 *   application: (e) => e.httpStatus,
 * });
 * ```
 */
export function matchErrorKind<R>(error: ApplicationError, handlers: ErrorKindHandlers<R>): R {
  if (error instanceof BusinessError) {
    return handlers.business(error);
  }
  if (error instanceof SecurityError) {
    return handlers.security(error);
  }
  if (error instanceof SystemError) {
    return handlers.system(error);
  }
  return handlers.application(error);
}
