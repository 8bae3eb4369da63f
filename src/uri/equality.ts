import type { UriComponents } from '../types/uri.js';

function segmentsEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function componentsEqual(a: UriComponents, b: UriComponents): boolean {
  return (
    a.scheme === b.scheme &&
    a.userInfo === b.userInfo &&
    a.host === b.host &&
    a.hasPort === b.hasPort &&
    a.port === b.port &&
    segmentsEqual(a.path, b.path) &&
    a.query === b.query &&
    a.fragment === b.fragment
  );
}
