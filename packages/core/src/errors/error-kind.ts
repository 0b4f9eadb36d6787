export const ERROR_KINDS = ['application', 'business', 'security', 'system'] as const;

/** Tag distinguishing the error variants. */
export type ErrorKind = (typeof ERROR_KINDS)[number];
