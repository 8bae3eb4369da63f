import { ErrorCode, UriComponent } from './enums.js';

export class UriParseError extends Error {
  readonly code: ErrorCode;
  readonly component: UriComponent;

  constructor(code: ErrorCode, component: UriComponent, message: string) {
    super(message);
    this.name = 'UriParseError';
    this.code = code;
    this.component = component;
  }
}
