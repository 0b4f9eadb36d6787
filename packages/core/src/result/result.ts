import { ApplicationError } from '../errors/application-error.js';
import { InvalidArgumentError } from '../errors/invalid-argument-error.js';

/** A value or a typed error, for module boundaries that should not throw. */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run an error constructor and return the construction failure as a value.
 *
 * ```ts
 * const built = tryConstruct(() => new BusinessError(status, DomainStatus.FAILURE, payload, text));
 * if (!built.ok) log.warn(built.error.details);
 * ```
 */
export function tryConstruct<T extends ApplicationError>(
  construct: () => T,
): Result<T, InvalidArgumentError> {
  try {
    return ok(construct());
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      return err(error);
    }
    throw error;
  }
}

/** Return an ApplicationError raised by `operation` as a result. Anything else is rethrown. */
export function captureApplicationError<T>(operation: () => T): Result<T, ApplicationError> {
  try {
    return ok(operation());
  } catch (error) {
    if (error instanceof ApplicationError) {
      return err(error);
    }
    throw error;
  }
}

export async function captureApplicationErrorAsync<T>(
  operation: () => Promise<T>,
): Promise<Result<T, ApplicationError>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (error instanceof ApplicationError) {
      return err(error);
    }
    throw error;
  }
}
