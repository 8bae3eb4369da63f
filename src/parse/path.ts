import { PCHAR_NOT_PCT_ENCODED } from '../charset/sets.js';
import { UriComponent } from '../types/enums.js';
import { decodeComponent } from '../decode/decodeComponent.js';

export function splitPath(pathString: string): string[] {
  if (pathString.length === 0) return [];
  // a lone "/" is the absolute root, not two empty segments
  if (pathString === '/') return [''];
  return pathString.split('/');
}

export function parsePath(pathString: string): string[] {
  return splitPath(pathString).map((segment) => decodeComponent(segment, PCHAR_NOT_PCT_ENCODED, UriComponent.PATH));
}
