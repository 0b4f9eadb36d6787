/**
 * Raised when an error type or the library configuration is given arguments that
 * break its invariants. `details` maps each argument name to its violations.
 */
export class InvalidArgumentError extends Error {
  readonly details: Record<string, string[]>;

  constructor(message: string, details: Record<string, string[]> = {}) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.details = details;

    // Restore prototype chain broken by extending built-in Error
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Build the error from field details, listing every violation in the message:
   * `Invalid BusinessError arguments: httpStatus: ...; message: ...`
   */
  static fromDetails(subject: string, details: Record<string, string[]>): InvalidArgumentError {
    const summary = Object.entries(details)
      .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
      .join('; ');
    return new InvalidArgumentError(`Invalid ${subject}: ${summary}`, details);
  }
}
