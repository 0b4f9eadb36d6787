import { z } from 'zod';

/**
 * Outcome category of an operation, shared across services.
 *
 * `SUCCESS` is part of the vocabulary but is never a valid status for an error.
 */
export const DOMAIN_STATUSES = ['SUCCESS', 'FAILURE', 'ERROR', 'PARTIAL', 'UNPROCESSED'] as const;

export const ERROR_DOMAIN_STATUSES = ['FAILURE', 'ERROR', 'PARTIAL', 'UNPROCESSED'] as const;

export const domainStatusSchema = z.enum(DOMAIN_STATUSES);

export type DomainStatus = z.infer<typeof domainStatusSchema>;

/** A domain status that may be attached to an error. */
export type ErrorDomainStatus = Exclude<DomainStatus, 'SUCCESS'>;

export const DomainStatus = domainStatusSchema.enum;

export function isDomainStatus(value: unknown): value is DomainStatus {
  return domainStatusSchema.safeParse(value).success;
}

export function isErrorDomainStatus(value: unknown): value is ErrorDomainStatus {
  return isDomainStatus(value) && value !== DomainStatus.SUCCESS;
}
