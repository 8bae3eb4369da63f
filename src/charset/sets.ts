import { CharacterSet } from './CharacterSet.js';

// RFC 3986 productions; the *_NOT_PCT_ENCODED sets leave out the pct-encoded alternative.

export const ALPHA = new CharacterSet(['a', 'z'], ['A', 'Z']);

export const DIGIT = CharacterSet.range('0', '9');

export const HEXDIG = new CharacterSet(['0', '9'], ['A', 'F'], ['a', 'f']);

export const UNRESERVED = new CharacterSet(ALPHA, DIGIT, '-._~');

export const SUB_DELIMS = new CharacterSet("!$&'()*+,;=");

export const SCHEME_NOT_FIRST = new CharacterSet(ALPHA, DIGIT, '+-.');

export const PCHAR_NOT_PCT_ENCODED = new CharacterSet(UNRESERVED, SUB_DELIMS, ':@');

export const QUERY_OR_FRAGMENT_NOT_PCT_ENCODED = new CharacterSet(PCHAR_NOT_PCT_ENCODED, '/?');

export const USER_INFO_NOT_PCT_ENCODED = new CharacterSet(UNRESERVED, SUB_DELIMS, ':');

export const REG_NAME_NOT_PCT_ENCODED = new CharacterSet(UNRESERVED, SUB_DELIMS);

export const IPV_FUTURE_LAST_PART = new CharacterSet(UNRESERVED, SUB_DELIMS, ':');
