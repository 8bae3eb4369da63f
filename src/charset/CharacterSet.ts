export type CodeRange = readonly [low: number, high: number];

export type CharacterRange = readonly [low: string, high: string];

/**
 * A string member adds each of its characters; a range is inclusive at both ends.
 */
export type CharacterSetMember = string | CharacterRange | CharacterSet;

function coalesce(ranges: CodeRange[]): CodeRange[] {
  const sorted = [...ranges].sort((a, b) => a[0] - b[0]);
  const out: Array<[number, number]> = [];
  for (const [low, high] of sorted) {
    const last = out[out.length - 1];
    if (last && low <= last[1] + 1) {
      last[1] = Math.max(last[1], high);
    } else {
      out.push([low, high]);
    }
  }
  return out;
}

export class CharacterSet {
  private readonly ranges: readonly CodeRange[];

  constructor(...members: CharacterSetMember[]) {
    const collected: CodeRange[] = [];
    for (const member of members) {
      if (member instanceof CharacterSet) {
        collected.push(...member.ranges);
      } else if (typeof member === 'string') {
        for (let i = 0; i < member.length; i += 1) {
          const code = member.charCodeAt(i);
          collected.push([code, code]);
        }
      } else {
        const low = member[0].charCodeAt(0);
        const high = member[1].charCodeAt(0);
        collected.push(low <= high ? [low, high] : [high, low]);
      }
    }
    this.ranges = Object.freeze(coalesce(collected));
    Object.freeze(this);
  }

  static range(low: string, high: string): CharacterSet {
    return new CharacterSet([low, high]);
  }

  contains(c: string): boolean {
    if (c.length !== 1) return false;
    return this.containsCode(c.charCodeAt(0));
  }

  containsCode(code: number): boolean {
    let lo = 0;
    let hi = this.ranges.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const [low, high] = this.ranges[mid];
      if (code < low) {
        hi = mid - 1;
      } else if (code > high) {
        lo = mid + 1;
      } else {
        return true;
      }
    }
    return false;
  }

  toRanges(): CodeRange[] {
    return this.ranges.map(([low, high]) => [low, high] as const);
  }
}
