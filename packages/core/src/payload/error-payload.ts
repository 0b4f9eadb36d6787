export interface ErrorCode {
  /** Stable identifier, e.g. `ORDER_NOT_FOUND`. */
  readonly code: string;
  readonly description: string;
}

/**
 * Structured error details carried by an application error, distinct from the
 * human-readable message.
 *
 * `nativeErrorText` holds the lower-level diagnostic text of the underlying
 * failure, or null when none is known.
 */
export interface ErrorPayload {
  readonly errorCode: ErrorCode;
  readonly description: string;
  readonly nativeErrorText: string | null;
}

export interface ErrorPayloadInit {
  errorCode: ErrorCode;
  description: string;
  nativeErrorText?: string | null;
}

function isBlank(text: string | null | undefined): boolean {
  return text === null || text === undefined || text.trim().length === 0;
}

/**
 * Mutable first stage of an error payload.
 *
 * The native error text can be recorded while the text is still unset (null or
 * blank); the first recorded value wins. `freeze()` produces the immutable payload
 * and closes the draft.
 */
export class ErrorPayloadDraft {
  private readonly errorCode: ErrorCode;
  private readonly description: string;
  private nativeErrorText: string | null;
  private frozen = false;

  constructor(init: ErrorPayloadInit) {
    this.errorCode = { code: init.errorCode.code, description: init.errorCode.description };
    this.description = init.description;
    this.nativeErrorText = init.nativeErrorText ?? null;
  }

  get currentNativeErrorText(): string | null {
    return this.nativeErrorText;
  }

  hasNativeErrorText(): boolean {
    return !isBlank(this.nativeErrorText);
  }

  /**
   * Record the native error text unless one is already set or the draft is frozen.
   * Returns whether the text was written.
   */
  recordNativeErrorText(text: string): boolean {
    if (this.frozen || this.hasNativeErrorText()) {
      return false;
    }
    this.nativeErrorText = text;
    return true;
  }

  freeze(): ErrorPayload {
    this.frozen = true;
    return Object.freeze({
      errorCode: Object.freeze({ ...this.errorCode }),
      description: this.description,
      nativeErrorText: this.nativeErrorText,
    });
  }
}

export function draftErrorPayload(init: ErrorPayloadInit): ErrorPayloadDraft {
  return new ErrorPayloadDraft(init);
}

export function createErrorPayload(init: ErrorPayloadInit): ErrorPayload {
  return draftErrorPayload(init).freeze();
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

/**
 * Structural check for a payload handed to an error constructor.
 * `nativeErrorText` may be absent, null or a string.
 */
export function isErrorPayload(value: unknown): value is ErrorPayloadInit {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('errorCode' in value) || !isErrorCode(value.errorCode)) {
    return false;
  }
  if (!('description' in value) || typeof value.description !== 'string') {
    return false;
  }
  if (!('nativeErrorText' in value)) {
    return true;
  }
  const text = value.nativeErrorText;
  return text === null || text === undefined || typeof text === 'string';
}
