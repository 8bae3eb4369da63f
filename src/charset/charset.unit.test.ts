import { describe, expect, it } from 'vitest';
import { CharacterSet } from './CharacterSet.js';
import {
  ALPHA,
  HEXDIG,
  IPV_FUTURE_LAST_PART,
  PCHAR_NOT_PCT_ENCODED,
  QUERY_OR_FRAGMENT_NOT_PCT_ENCODED,
  REG_NAME_NOT_PCT_ENCODED,
  SCHEME_NOT_FIRST,
  USER_INFO_NOT_PCT_ENCODED
} from './sets.js';

describe('CharacterSet', () => {
  it('matches single characters and inclusive ranges', () => {
    const set = new CharacterSet('x', ['0', '3']);
    expect(set.contains('x')).toBe(true);
    expect(set.contains('0')).toBe(true);
    expect(set.contains('3')).toBe(true);
    expect(set.contains('4')).toBe(false);
    expect(set.contains('y')).toBe(false);
  });

  it('merges member sets', () => {
    const set = new CharacterSet(CharacterSet.range('a', 'c'), CharacterSet.range('x', 'z'), '_');
    expect(set.contains('b')).toBe(true);
    expect(set.contains('y')).toBe(true);
    expect(set.contains('_')).toBe(true);
    expect(set.contains('m')).toBe(false);
  });

  it('coalesces overlapping and adjacent ranges', () => {
    const set = new CharacterSet(['a', 'f'], ['d', 'k'], 'l', ['0', '9']);
    expect(set.toRanges()).toEqual([
      [0x30, 0x39],
      [0x61, 0x6c]
    ]);
  });

  it('accepts a range given high to low', () => {
    expect(new CharacterSet(['z', 'x']).contains('y')).toBe(true);
  });

  it('rejects anything but a single character', () => {
    expect(ALPHA.contains('')).toBe(false);
    expect(ALPHA.contains('ab')).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(ALPHA)).toBe(true);
  });
});

describe('grammar tables', () => {
  it('limits scheme characters after the first', () => {
    for (const c of ['a', 'Z', '7', '+', '-', '.']) {
      expect(SCHEME_NOT_FIRST.contains(c)).toBe(true);
    }
    for (const c of ['_', '~', ':', '@']) {
      expect(SCHEME_NOT_FIRST.contains(c)).toBe(false);
    }
  });

  it('allows ":" and "@" in path segments but not brackets or "/"', () => {
    expect(PCHAR_NOT_PCT_ENCODED.contains(':')).toBe(true);
    expect(PCHAR_NOT_PCT_ENCODED.contains('@')).toBe(true);
    expect(PCHAR_NOT_PCT_ENCODED.contains('[')).toBe(false);
    expect(PCHAR_NOT_PCT_ENCODED.contains(']')).toBe(false);
    expect(PCHAR_NOT_PCT_ENCODED.contains('/')).toBe(false);
    expect(PCHAR_NOT_PCT_ENCODED.contains('%')).toBe(false);
  });

  it('adds "/" and "?" for query and fragment', () => {
    expect(QUERY_OR_FRAGMENT_NOT_PCT_ENCODED.contains('/')).toBe(true);
    expect(QUERY_OR_FRAGMENT_NOT_PCT_ENCODED.contains('?')).toBe(true);
    expect(QUERY_OR_FRAGMENT_NOT_PCT_ENCODED.contains('#')).toBe(false);
  });

  it('keeps "@" out of user info and ":" out of reg-names', () => {
    expect(USER_INFO_NOT_PCT_ENCODED.contains(':')).toBe(true);
    expect(USER_INFO_NOT_PCT_ENCODED.contains('@')).toBe(false);
    expect(REG_NAME_NOT_PCT_ENCODED.contains(':')).toBe(false);
    expect(REG_NAME_NOT_PCT_ENCODED.contains('!')).toBe(true);
  });

  it('covers hex digits in both cases', () => {
    expect(HEXDIG.contains('f')).toBe(true);
    expect(HEXDIG.contains('F')).toBe(true);
    expect(HEXDIG.contains('g')).toBe(false);
    expect(IPV_FUTURE_LAST_PART.contains(':')).toBe(true);
    expect(IPV_FUTURE_LAST_PART.contains(']')).toBe(false);
  });
});
