import type { ErrorPayloadInit } from '../payload/error-payload.js';
import type { DomainStatus } from '../status/domain-status.js';

import { ApplicationError } from './application-error.js';
import type { ApplicationErrorOptions } from './application-error.js';

/** Infrastructure and dependency failures: databases, downstream services, timeouts. */
export class SystemError extends ApplicationError {
  constructor(
    httpStatus: number,
    domainStatus: DomainStatus,
    errorPayload: ErrorPayloadInit,
    message: string,
    cause?: unknown,
    options?: ApplicationErrorOptions,
  ) {
    super(httpStatus, domainStatus, errorPayload, message, cause, options);
    this.name = 'SystemError';
  }

  override get kind(): 'system' {
    return 'system';
  }
}
