import { DIGIT } from '../charset/sets.js';
import { ErrorCode, UriComponent } from '../types/enums.js';
import { UriParseError } from '../types/error.js';

export const MAX_PORT = 0xffff;

export function parsePort(portString: string): number {
  let value = 0;
  for (const c of portString) {
    if (!DIGIT.contains(c)) {
      throw new UriParseError(ErrorCode.INVALID_PORT, UriComponent.PORT, `Port ${JSON.stringify(portString)} is not a number`);
    }
    value = value * 10 + (c.charCodeAt(0) - 0x30);
    if (value > MAX_PORT) {
      throw new UriParseError(ErrorCode.INVALID_PORT, UriComponent.PORT, `Port ${JSON.stringify(portString)} is out of range`);
    }
  }
  return value;
}
