import type { CharacterSet } from '../charset/CharacterSet.js';
import { ErrorCode, UriComponent } from '../types/enums.js';
import { UriParseError } from '../types/error.js';
import { PercentEncodedCharacterDecoder } from './PercentEncodedCharacterDecoder.js';

const ILLEGAL_CHARACTER_CODES: Record<UriComponent, ErrorCode> = {
  [UriComponent.SCHEME]: ErrorCode.INVALID_SCHEME,
  [UriComponent.USER_INFO]: ErrorCode.INVALID_USER_INFO,
  [UriComponent.HOST]: ErrorCode.INVALID_HOST,
  [UriComponent.PORT]: ErrorCode.INVALID_PORT,
  [UriComponent.PATH]: ErrorCode.INVALID_PATH,
  [UriComponent.QUERY]: ErrorCode.INVALID_QUERY,
  [UriComponent.FRAGMENT]: ErrorCode.INVALID_FRAGMENT
};

export function illegalCharacter(component: UriComponent, c: string, text: string): UriParseError {
  return new UriParseError(
    ILLEGAL_CHARACTER_CODES[component],
    component,
    `Illegal character ${JSON.stringify(c)} in ${JSON.stringify(text)}`
  );
}

export function invalidPercentEncoding(component: UriComponent, text: string): UriParseError {
  return new UriParseError(
    ErrorCode.INVALID_PERCENT_ENCODING,
    component,
    `Invalid percent encoding in ${JSON.stringify(text)}`
  );
}

/**
 * Checks `encoded` against `allowed` and replaces each `%XX` escape with the character
 * whose code is the escaped octet.
 */
export function decodeComponent(encoded: string, allowed: CharacterSet, component: UriComponent): string {
  let out = '';
  let decoder: PercentEncodedCharacterDecoder | null = null;
  for (const c of encoded) {
    if (decoder) {
      if (!decoder.nextEncodedCharacter(c)) {
        throw invalidPercentEncoding(component, encoded);
      }
      if (decoder.isDone()) {
        out += String.fromCharCode(decoder.decodedCharacter());
        decoder = null;
      }
    } else if (c === '%') {
      decoder = new PercentEncodedCharacterDecoder();
    } else if (allowed.contains(c)) {
      out += c;
    } else {
      throw illegalCharacter(component, c, encoded);
    }
  }
  if (decoder) {
    throw invalidPercentEncoding(component, encoded);
  }
  return out;
}
