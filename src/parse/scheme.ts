import { ALPHA, SCHEME_NOT_FIRST } from '../charset/sets.js';
import { ErrorCode, UriComponent } from '../types/enums.js';
import { UriParseError } from '../types/error.js';
import { asciiFold } from '../utils/asciiFold.js';

export interface SchemeSplit {
  scheme: string;
  rest: string;
}

export function isLegalScheme(candidate: string): boolean {
  let isFirstCharacter = true;
  for (const c of candidate) {
    const allowed = isFirstCharacter ? ALPHA : SCHEME_NOT_FIRST;
    if (!allowed.contains(c)) return false;
    isFirstCharacter = false;
  }
  return !isFirstCharacter;
}

// Only a colon ahead of the first "/" can end a scheme; later colons belong to the
// authority, path, query or fragment.
export function splitScheme(input: string): SchemeSplit {
  const firstSlash = input.indexOf('/');
  const head = firstSlash === -1 ? input : input.slice(0, firstSlash);
  const schemeEnd = head.indexOf(':');
  if (schemeEnd === -1) {
    return { scheme: '', rest: input };
  }
  const candidate = input.slice(0, schemeEnd);
  if (!isLegalScheme(candidate)) {
    throw new UriParseError(
      ErrorCode.INVALID_SCHEME,
      UriComponent.SCHEME,
      candidate.length === 0 ? 'Scheme cannot be empty' : `Illegal scheme ${JSON.stringify(candidate)}`
    );
  }
  return { scheme: asciiFold(candidate), rest: input.slice(schemeEnd + 1) };
}
