import { removeDotSegments } from '../normalize/removeDotSegments.js';
import { parseComponents } from '../parse/parseComponents.js';
import { UriParseError } from '../types/error.js';
import type { UriComponents } from '../types/uri.js';
import { componentsEqual } from './equality.js';

export type ParseResult = { readonly ok: true; readonly uri: Uri } | { readonly ok: false; readonly error: UriParseError };

/**
 * A parsed URI reference. Every field is decoded; only the path changes after
 * construction, and only through `normalizePath`.
 */
export class Uri {
  readonly scheme: string;
  readonly userInfo: string;
  readonly host: string;
  readonly hasPort: boolean;
  readonly port: number;
  readonly query: string;
  readonly fragment: string;
  private segments: string[];

  private constructor(components: UriComponents) {
    this.scheme = components.scheme;
    this.userInfo = components.userInfo;
    this.host = components.host;
    this.hasPort = components.hasPort;
    this.port = components.port;
    this.segments = [...components.path];
    this.query = components.query;
    this.fragment = components.fragment;
  }

  static parse(input: string): Uri {
    return new Uri(parseComponents(input));
  }

  get path(): string[] {
    return [...this.segments];
  }

  isRelativeReference(): boolean {
    return this.scheme.length === 0;
  }

  containsRelativePath(): boolean {
    return this.segments.length === 0 || this.segments[0] !== '';
  }

  normalizePath(): this {
    this.segments = removeDotSegments(this.segments);
    return this;
  }

  equals(other: Uri): boolean {
    return componentsEqual(this.toComponents(), other.toComponents());
  }

  toComponents(): UriComponents {
    return {
      scheme: this.scheme,
      userInfo: this.userInfo,
      host: this.host,
      hasPort: this.hasPort,
      port: this.port,
      path: this.path,
      query: this.query,
      fragment: this.fragment
    };
  }
}

export function parseUri(input: string): ParseResult {
  try {
    return { ok: true, uri: Uri.parse(input) };
  } catch (err) {
    if (err instanceof UriParseError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export function normalizePath(uri: Uri): Uri {
  return uri.normalizePath();
}

export function urisEqual(a: Uri, b: Uri): boolean {
  return a.equals(b);
}
