export { CharacterSet } from './charset/CharacterSet.js';
export type { CharacterRange, CharacterSetMember, CodeRange } from './charset/CharacterSet.js';
export {
  ALPHA,
  DIGIT,
  HEXDIG,
  UNRESERVED,
  SUB_DELIMS,
  SCHEME_NOT_FIRST,
  PCHAR_NOT_PCT_ENCODED,
  QUERY_OR_FRAGMENT_NOT_PCT_ENCODED,
  USER_INFO_NOT_PCT_ENCODED,
  REG_NAME_NOT_PCT_ENCODED,
  IPV_FUTURE_LAST_PART
} from './charset/sets.js';
export { PercentEncodedCharacterDecoder, DecoderState } from './decode/PercentEncodedCharacterDecoder.js';
export { decodeComponent } from './decode/decodeComponent.js';
export { removeDotSegments } from './normalize/removeDotSegments.js';
export { Uri, parseUri, normalizePath, urisEqual } from './uri/Uri.js';
export type { ParseResult } from './uri/Uri.js';
export { ErrorCode, UriComponent } from './types/enums.js';
export { UriParseError } from './types/error.js';
export type { UriComponents } from './types/uri.js';
