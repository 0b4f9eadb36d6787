export {
  DOMAIN_STATUSES,
  ERROR_DOMAIN_STATUSES,
  DomainStatus,
  domainStatusSchema,
  isDomainStatus,
  isErrorDomainStatus,
} from './domain-status.js';
export type { ErrorDomainStatus } from './domain-status.js';
export {
  HttpStatus,
  MAX_ERROR_STATUS,
  MIN_ERROR_STATUS,
  isClientErrorStatus,
  isErrorStatus,
  isServerErrorStatus,
} from './http-status.js';
