import { getExceptionsConfig } from '../config/exceptions-config.js';
import { draftErrorPayload } from '../payload/error-payload.js';
import type { ErrorPayload, ErrorPayloadInit } from '../payload/error-payload.js';
import { backfillNativeErrorText } from '../root-cause/root-cause.js';
import type { DomainStatus, ErrorDomainStatus } from '../status/domain-status.js';

import { parseErrorArguments } from './error-arguments.js';
import type { ErrorKind } from './error-kind.js';

export interface ApplicationErrorOptions {
  /** Overrides the configured root-cause backfill for this error only. */
  rootCauseBackfill?: boolean;
}

/**
 * Base application error carrying an HTTP error status, a non-success domain
 * status, a structured payload and a non-blank message.
 *
 * Arguments are validated once, before the instance exists; any violation throws
 * InvalidArgumentError. The payload is copied and frozen. When its native error
 * text is unset and a cause is given, the text is taken from the deepest message
 * in the cause chain (see `configureExceptions`).
 *
 * ```ts
 * throw new ApplicationError(
 *   HttpStatus.CONFLICT,
 *   DomainStatus.FAILURE,
 *   createErrorPayload({
 *     errorCode: { code: 'ORDER_LOCKED', description: 'Order locked' },
 *     description: 'Order is locked',
 *   }),
 *   'Order 42 cannot be changed',
 *   cause,
 * );
 * ```
 */
export class ApplicationError extends Error {
  readonly httpStatus: number;
  readonly domainStatus: ErrorDomainStatus;
  readonly errorPayload: ErrorPayload;

  constructor(
    httpStatus: number,
    domainStatus: DomainStatus,
    errorPayload: ErrorPayloadInit,
    message: string,
    cause?: unknown,
    options: ApplicationErrorOptions = {},
  ) {
    const config = getExceptionsConfig();
    const args = parseErrorArguments(
      new.target.name,
      { httpStatus, domainStatus, errorPayload, message },
      config.logger,
    );

    const draft = draftErrorPayload(args.errorPayload);
    const backfilled = backfillNativeErrorText(draft, cause, {
      rootCauseBackfill: options.rootCauseBackfill ?? config.rootCauseBackfill,
      unknownRootCauseText: config.unknownRootCauseText,
    });
    if (backfilled !== undefined) {
      config.logger.debug(
        { errorKind: new.target.name, errorCode: args.errorPayload.errorCode.code },
        'Backfilled native error text from root cause',
      );
    }

    super(args.message, cause === undefined ? undefined : { cause });
    this.name = 'ApplicationError';
    this.httpStatus = args.httpStatus;
    this.domainStatus = args.domainStatus;
    this.errorPayload = draft.freeze();

    // Restore prototype chain broken by extending built-in Error
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get kind(): ErrorKind {
    return 'application';
  }

  override toString(): string {
    return (
      `${this.name}(` +
      `httpStatus=${this.httpStatus}, ` +
      `domainStatus=${this.domainStatus}, ` +
      `message='${this.message}', ` +
      `nativeErrorText=${this.errorPayload.nativeErrorText ?? 'null'}` +
      ')'
    );
  }
}
