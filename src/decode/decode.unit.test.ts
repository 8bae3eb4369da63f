import { describe, expect, it } from 'vitest';
import { PercentEncodedCharacterDecoder } from './PercentEncodedCharacterDecoder.js';
import { decodeComponent } from './decodeComponent.js';
import { PCHAR_NOT_PCT_ENCODED } from '../charset/sets.js';
import { ErrorCode, UriComponent } from '../types/enums.js';
import { UriParseError } from '../types/error.js';

function decodePair(first: string, second: string): number | null {
  const decoder = new PercentEncodedCharacterDecoder();
  if (!decoder.nextEncodedCharacter(first) || !decoder.nextEncodedCharacter(second)) {
    return null;
  }
  return decoder.isDone() ? decoder.decodedCharacter() : null;
}

describe('PercentEncodedCharacterDecoder', () => {
  it('decodes hex digits in either case', () => {
    expect(decodePair('4', '1')).toBe(0x41);
    expect(decodePair('4', 'a')).toBe(0x4a);
    expect(decodePair('4', 'A')).toBe(0x4a);
    expect(decodePair('b', 'C')).toBe(0xbc);
    expect(decodePair('0', '0')).toBe(0);
    expect(decodePair('F', 'f')).toBe(0xff);
  });

  it('is not done after one digit', () => {
    const decoder = new PercentEncodedCharacterDecoder();
    expect(decoder.nextEncodedCharacter('7')).toBe(true);
    expect(decoder.isDone()).toBe(false);
  });

  it('rejects non-hex digits', () => {
    expect(decodePair('X', '1')).toBeNull();
    expect(decodePair('1', 'g')).toBeNull();
  });

  it('rejects input once done', () => {
    const decoder = new PercentEncodedCharacterDecoder();
    decoder.nextEncodedCharacter('2');
    decoder.nextEncodedCharacter('0');
    expect(decoder.nextEncodedCharacter('0')).toBe(false);
    expect(decoder.decodedCharacter()).toBe(0x20);
  });
});

describe('decodeComponent', () => {
  it('decodes escapes and copies allowed characters', () => {
    expect(decodeComponent('%41%42%43', PCHAR_NOT_PCT_ENCODED, UriComponent.PATH)).toBe('ABC');
    expect(decodeComponent('hello,%20w%6Frld', PCHAR_NOT_PCT_ENCODED, UriComponent.PATH)).toBe('hello, world');
  });

  it('keeps each decoded octet as one character', () => {
    expect(decodeComponent('%bc', PCHAR_NOT_PCT_ENCODED, UriComponent.PATH)).toBe('\xbc');
    expect(decodeComponent('%2F', PCHAR_NOT_PCT_ENCODED, UriComponent.PATH)).toBe('/');
  });

  it('rejects characters outside the allowed set', () => {
    try {
      decodeComponent('foo[bar', PCHAR_NOT_PCT_ENCODED, UriComponent.PATH);
      throw new Error('expected a parse error');
    } catch (err) {
      expect(err).toBeInstanceOf(UriParseError);
      expect((err as UriParseError).code).toBe(ErrorCode.INVALID_PATH);
      expect((err as UriParseError).component).toBe(UriComponent.PATH);
    }
  });

  it('rejects malformed and truncated escapes', () => {
    expect(() => decodeComponent('%X1', PCHAR_NOT_PCT_ENCODED, UriComponent.QUERY)).toThrowError(UriParseError);
    expect(() => decodeComponent('ab%4', PCHAR_NOT_PCT_ENCODED, UriComponent.QUERY)).toThrowError(UriParseError);
    expect(() => decodeComponent('%', PCHAR_NOT_PCT_ENCODED, UriComponent.QUERY)).toThrowError(
      'Invalid percent encoding in "%"'
    );
  });
});
