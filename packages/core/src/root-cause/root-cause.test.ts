import { describe, expect, it } from 'vitest';

import { DEFAULT_UNKNOWN_ROOT_CAUSE_TEXT } from '../config/exceptions-config.js';
import { draftErrorPayload } from '../payload/error-payload.js';

import { backfillNativeErrorText, findRootCause, findRootCauseMessage } from './root-cause.js';

const settings = { rootCauseBackfill: true, unknownRootCauseText: DEFAULT_UNKNOWN_ROOT_CAUSE_TEXT };

function draft(nativeErrorText: string | null = null) {
  return draftErrorPayload({
    errorCode: { code: 'DOWNSTREAM_FAILED', description: 'Downstream call failed' },
    description: 'Inventory lookup failed',
    nativeErrorText,
  });
}

describe('findRootCause', () => {
  it('returns the deepest entry of the chain', () => {
    const root = new Error('root');
    const middle = new Error('middle', { cause: root });
    const top = new Error('top', { cause: middle });

    expect(findRootCause(top)).toBe(root);
  });

  it('returns the cause itself when it wraps nothing', () => {
    const single = new Error('single');
    expect(findRootCause(single)).toBe(single);
  });

  it('returns undefined without a cause', () => {
    expect(findRootCause(undefined)).toBeUndefined();
    expect(findRootCause(null)).toBeUndefined();
  });

  it('stops at a cycle', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(findRootCause(second)).toBe(first);
  });
});

describe('findRootCauseMessage', () => {
  it('takes the message of the deepest entry', () => {
    const root = new Error('root');
    const top = new Error('top', { cause: new Error('middle', { cause: root }) });

    expect(findRootCauseMessage(top)).toBe('root');
  });

  it('skips deeper entries whose message is blank', () => {
    const top = new Error('top', { cause: new Error('middle', { cause: new Error('  ') }) });

    expect(findRootCauseMessage(top)).toBe('middle');
  });

  it('reads plain strings and message-bearing objects', () => {
    expect(findRootCauseMessage('socket hang up')).toBe('socket hang up');
    expect(findRootCauseMessage({ message: 'outer', cause: { message: 'inner' } })).toBe('inner');
    expect(findRootCauseMessage(new Error('wrapper', { cause: 'ECONNRESET' }))).toBe('ECONNRESET');
  });

  it('returns undefined when no entry carries a message', () => {
    expect(findRootCauseMessage(new Error())).toBeUndefined();
    expect(findRootCauseMessage({ code: 42 })).toBeUndefined();
  });
});

describe('backfillNativeErrorText', () => {
  it('writes the root cause message into an unset payload', () => {
    const target = draft();
    const cause = new Error('top', { cause: new Error('disk full') });

    expect(backfillNativeErrorText(target, cause, settings)).toBe('disk full');
    expect(target.currentNativeErrorText).toBe('disk full');
  });

  it('falls back to the sentinel when the chain has no message', () => {
    const target = draft();

    expect(backfillNativeErrorText(target, new Error(), settings)).toBe('unknown root cause');
    expect(target.currentNativeErrorText).toBe('unknown root cause');
  });

  it('uses the configured sentinel', () => {
    const target = draft();
    backfillNativeErrorText(target, new Error(), { ...settings, unknownRootCauseText: 'n/a' });

    expect(target.currentNativeErrorText).toBe('n/a');
  });

  it('leaves preset text untouched', () => {
    const target = draft('preset');

    expect(backfillNativeErrorText(target, new Error('other'), settings)).toBeUndefined();
    expect(target.currentNativeErrorText).toBe('preset');
  });

  it('does nothing without a cause', () => {
    const target = draft();

    expect(backfillNativeErrorText(target, undefined, settings)).toBeUndefined();
    expect(target.currentNativeErrorText).toBeNull();
  });

  it('does nothing when disabled', () => {
    const target = draft();

    backfillNativeErrorText(target, new Error('root'), { ...settings, rootCauseBackfill: false });
    expect(target.currentNativeErrorText).toBeNull();
  });
});
