import type { Logger } from 'pino';
import { z } from 'zod';

import { isErrorPayload } from '../payload/error-payload.js';
import type { ErrorPayloadInit } from '../payload/error-payload.js';
import { DomainStatus, ERROR_DOMAIN_STATUSES } from '../status/domain-status.js';
import { isErrorStatus } from '../status/http-status.js';
import { extractFieldErrors } from '../validation/extract-field-errors.js';

import { InvalidArgumentError } from './invalid-argument-error.js';

export const HTTP_STATUS_VIOLATION =
  'HTTP status must be a client or server error status (400-599)';
export const SUCCESS_STATUS_VIOLATION = 'Domain status must not be SUCCESS for an error';
export const BLANK_MESSAGE_VIOLATION = 'Error message must not be blank';
export const PAYLOAD_VIOLATION = 'Error payload must carry an error code and a description';

/**
 * Constructor arguments shared by every application error kind.
 * All violations are reported together.
 */
export const errorArgumentsSchema = z.object({
  httpStatus: z
    .number({ error: HTTP_STATUS_VIOLATION })
    .refine(isErrorStatus, HTTP_STATUS_VIOLATION),
  domainStatus: z.enum(ERROR_DOMAIN_STATUSES, {
    error: (issue) => (issue.input === DomainStatus.SUCCESS ? SUCCESS_STATUS_VIOLATION : undefined),
  }),
  errorPayload: z.custom<ErrorPayloadInit>(isErrorPayload, PAYLOAD_VIOLATION),
  message: z.string().refine((text) => text.trim().length > 0, BLANK_MESSAGE_VIOLATION),
});

export type ErrorArguments = z.infer<typeof errorArgumentsSchema>;

export interface ErrorArgumentsInput {
  httpStatus: number;
  domainStatus: string;
  errorPayload: ErrorPayloadInit;
  message: string;
}

/**
 * Validate constructor arguments for the named error type, throwing
 * InvalidArgumentError with per-argument details on any violation.
 */
export function parseErrorArguments(
  subject: string,
  input: ErrorArgumentsInput,
  logger: Logger,
): ErrorArguments {
  const result = errorArgumentsSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const details = extractFieldErrors(result.error.issues);
  logger.debug({ errorKind: subject, details }, 'Rejected error construction');
  throw InvalidArgumentError.fromDetails(`${subject} arguments`, details);
}
