import type { ExceptionsSettings } from '../config/exceptions-config.js';
import type { ErrorPayloadDraft } from '../payload/error-payload.js';

function causeOf(entry: unknown): unknown {
  if (typeof entry === 'object' && entry !== null && 'cause' in entry) {
    return entry.cause;
  }
  return undefined;
}

function messageOf(entry: unknown): string | undefined {
  if (typeof entry === 'string') {
    return entry;
  }
  if (entry instanceof Error) {
    return entry.message;
  }
  if (
    typeof entry === 'object' &&
    entry !== null &&
    'message' in entry &&
    typeof entry.message === 'string'
  ) {
    return entry.message;
  }
  return undefined;
}

/**
 * Walk a cause chain from its head. Stops at the first entry without a cause or
 * at an entry already visited, so cyclic chains terminate.
 */
function* walkCauseChain(cause: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let entry = cause;
  while (entry !== undefined && entry !== null && !seen.has(entry)) {
    seen.add(entry);
    yield entry;
    entry = causeOf(entry);
  }
}

/** The deepest entry in a chain of wrapped failures, or undefined for no cause. */
export function findRootCause(cause: unknown): unknown {
  let root: unknown;
  for (const entry of walkCauseChain(cause)) {
    root = entry;
  }
  return root;
}

/** The deepest non-blank message found anywhere in the cause chain. */
export function findRootCauseMessage(cause: unknown): string | undefined {
  let deepest: string | undefined;
  for (const entry of walkCauseChain(cause)) {
    const message = messageOf(entry);
    if (message !== undefined && message.trim().length > 0) {
      deepest = message;
    }
  }
  return deepest;
}

/**
 * Fill an unset native error text from the cause chain, falling back to the
 * configured sentinel when no entry carries a message. Returns the text written,
 * or undefined when the draft was left untouched.
 */
export function backfillNativeErrorText(
  draft: ErrorPayloadDraft,
  cause: unknown,
  settings: ExceptionsSettings,
): string | undefined {
  if (!settings.rootCauseBackfill || cause === undefined || cause === null) {
    return undefined;
  }
  if (draft.hasNativeErrorText()) {
    return undefined;
  }
  const text = findRootCauseMessage(cause) ?? settings.unknownRootCauseText;
  return draft.recordNativeErrorText(text) ? text : undefined;
}
