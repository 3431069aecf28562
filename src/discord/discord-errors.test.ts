import { describe, expect, it } from 'vitest';
import { UNKNOWN_MEMBER, UNKNOWN_MESSAGE, errorCode, isUnknownEntity } from './discord-errors.js';

describe('errorCode', () => {
  it('reads numeric codes off API errors', () => {
    expect(errorCode(Object.assign(new Error('Unknown Message'), { code: 10008 }))).toBe(10008);
  });

  it('returns null for anything without a numeric code', () => {
    expect(errorCode(new Error('boom'))).toBeNull();
    expect(errorCode({ code: 'ECONNRESET' })).toBeNull();
    expect(errorCode(null)).toBeNull();
  });
});

describe('isUnknownEntity', () => {
  it('matches only the listed codes', () => {
    const err = { code: UNKNOWN_MESSAGE };
    expect(isUnknownEntity(err, UNKNOWN_MESSAGE)).toBe(true);
    expect(isUnknownEntity(err, UNKNOWN_MEMBER)).toBe(false);
  });
});
