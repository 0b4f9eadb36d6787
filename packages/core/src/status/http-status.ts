/**
 * Named HTTP error status codes commonly raised by services.
 * Any integer in 400-599 is accepted by the error types, not only these.
 */
export const HttpStatus = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  PAYMENT_REQUIRED: 402,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  NOT_ACCEPTABLE: 406,
  REQUEST_TIMEOUT: 408,
  CONFLICT: 409,
  GONE: 410,
  PRECONDITION_FAILED: 412,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  UNPROCESSABLE_ENTITY: 422,
  LOCKED: 423,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

export const MIN_ERROR_STATUS = 400;
export const MAX_ERROR_STATUS = 599;

export function isErrorStatus(code: number): boolean {
  return Number.isInteger(code) && code >= MIN_ERROR_STATUS && code <= MAX_ERROR_STATUS;
}

export function isClientErrorStatus(code: number): boolean {
  return Number.isInteger(code) && code >= 400 && code <= 499;
}

export function isServerErrorStatus(code: number): boolean {
  return Number.isInteger(code) && code >= 500 && code <= MAX_ERROR_STATUS;
}
