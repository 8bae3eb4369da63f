function isRootMarkerOnly(out: string[]): boolean {
  return out.length === 1 && out[0] === '';
}

/**
 * Removes "." and ".." segments from a parsed path. A ".." never pops the leading
 * empty segment of an absolute path and never climbs above the start of a
 * relative one.
 */
export function removeDotSegments(segments: readonly string[]): string[] {
  const out: string[] = [];
  for (const segment of segments) {
    if (segment === '.') {
      continue;
    }
    if (segment === '..') {
      if (out.length > 0 && !isRootMarkerOnly(out)) {
        out.pop();
      }
      continue;
    }
    out.push(segment);
  }
  return out;
}
