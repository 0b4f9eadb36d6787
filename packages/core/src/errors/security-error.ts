import type { ErrorPayloadInit } from '../payload/error-payload.js';
import type { DomainStatus } from '../status/domain-status.js';

import { ApplicationError } from './application-error.js';
import type { ApplicationErrorOptions } from './application-error.js';

/** Authentication and authorization failures. Usually 401, 403 or 429. */
export class SecurityError extends ApplicationError {
  constructor(
    httpStatus: number,
    domainStatus: DomainStatus,
    errorPayload: ErrorPayloadInit,
    message: string,
    cause?: unknown,
    options?: ApplicationErrorOptions,
  ) {
    super(httpStatus, domainStatus, errorPayload, message, cause, options);
    this.name = 'SecurityError';
  }

  override get kind(): 'security' {
    return 'security';
  }
}
