import { DIGIT, HEXDIG } from '../charset/sets.js';

export enum DecoderState {
  AWAITING_FIRST_DIGIT = 'AWAITING_FIRST_DIGIT',
  AWAITING_SECOND_DIGIT = 'AWAITING_SECOND_DIGIT',
  DONE = 'DONE'
}

function hexValue(c: string): number {
  const code = c.charCodeAt(0);
  if (DIGIT.containsCode(code)) return code - 0x30;
  // fold A-F onto a-f
  return (code | 0x20) - 0x61 + 10;
}

/**
 * Decodes the two hex digits following a `%`. One instance per escape sequence.
 */
export class PercentEncodedCharacterDecoder {
  private state = DecoderState.AWAITING_FIRST_DIGIT;
  private value = 0;

  nextEncodedCharacter(c: string): boolean {
    if (this.state === DecoderState.DONE || !HEXDIG.contains(c)) {
      return false;
    }
    this.value = this.value * 16 + hexValue(c);
    this.state =
      this.state === DecoderState.AWAITING_FIRST_DIGIT ? DecoderState.AWAITING_SECOND_DIGIT : DecoderState.DONE;
    return true;
  }

  isDone(): boolean {
    return this.state === DecoderState.DONE;
  }

  decodedCharacter(): number {
    return this.value;
  }
}
