import { CharacterSet } from '../charset/CharacterSet.js';

const UPPER_ALPHA = CharacterSet.range('A', 'Z');

// Lower-cases A-Z only; decoded octets above 0x7f pass through untouched.
export function asciiFold(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i);
    out += UPPER_ALPHA.containsCode(code) ? String.fromCharCode(code | 0x20) : value[i];
  }
  return out;
}
