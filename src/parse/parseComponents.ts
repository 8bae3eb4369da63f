import { QUERY_OR_FRAGMENT_NOT_PCT_ENCODED } from '../charset/sets.js';
import { decodeComponent } from '../decode/decodeComponent.js';
import { UriComponent } from '../types/enums.js';
import type { Authority, UriComponents } from '../types/uri.js';
import { parseAuthority } from './authority.js';
import { parsePath } from './path.js';
import { splitScheme } from './scheme.js';

const NO_AUTHORITY: Authority = { userInfo: '', host: '', hasPort: false, port: 0 };

export interface ReferenceParts {
  authority: string | null;
  path: string;
  queryAndFragment: string;
}

export function splitReference(rest: string): ReferenceParts {
  const pathEnd = rest.search(/[?#]/);
  const authorityAndPath = pathEnd === -1 ? rest : rest.slice(0, pathEnd);
  const queryAndFragment = rest.slice(authorityAndPath.length);
  if (!authorityAndPath.startsWith('//')) {
    return { authority: null, path: authorityAndPath, queryAndFragment };
  }
  const afterMarker = authorityAndPath.slice(2);
  const authorityEnd = afterMarker.indexOf('/');
  if (authorityEnd === -1) {
    return { authority: afterMarker, path: '', queryAndFragment };
  }
  return {
    authority: afterMarker.slice(0, authorityEnd),
    path: afterMarker.slice(authorityEnd),
    queryAndFragment
  };
}

/**
 * Splits and decodes a URI reference. Throws `UriParseError` on the first component
 * that breaks its grammar.
 */
export function parseComponents(input: string): UriComponents {
  const { scheme, rest } = splitScheme(input);
  const parts = splitReference(rest);
  const authority = parts.authority === null ? NO_AUTHORITY : parseAuthority(parts.authority);
  const path = parsePath(parts.path);

  const fragmentStart = parts.queryAndFragment.indexOf('#');
  const fragment =
    fragmentStart === -1
      ? ''
      : decodeComponent(
          parts.queryAndFragment.slice(fragmentStart + 1),
          QUERY_OR_FRAGMENT_NOT_PCT_ENCODED,
          UriComponent.FRAGMENT
        );
  const queryPart = fragmentStart === -1 ? parts.queryAndFragment : parts.queryAndFragment.slice(0, fragmentStart);
  const query = decodeComponent(
    queryPart.startsWith('?') ? queryPart.slice(1) : queryPart,
    QUERY_OR_FRAGMENT_NOT_PCT_ENCODED,
    UriComponent.QUERY
  );

  return { scheme, ...authority, path, query, fragment };
}
