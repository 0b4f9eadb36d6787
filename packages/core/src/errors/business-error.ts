import type { ErrorPayloadInit } from '../payload/error-payload.js';
import type { DomainStatus } from '../status/domain-status.js';

import { ApplicationError } from './application-error.js';
import type { ApplicationErrorOptions } from './application-error.js';

/**
 * Domain rule violations and business validation failures, e.g. insufficient
 * funds, an invalid state transition or a duplicate record. Usually 400, 409,
 * 412 or 422.
 */
export class BusinessError extends ApplicationError {
  constructor(
    httpStatus: number,
    domainStatus: DomainStatus,
    errorPayload: ErrorPayloadInit,
    message: string,
    cause?: unknown,
    options?: ApplicationErrorOptions,
  ) {
    super(httpStatus, domainStatus, errorPayload, message, cause, options);
    this.name = 'BusinessError';
  }

  override get kind(): 'business' {
    return 'business';
  }
}
