/**
 * Length-limited values.
 *
 * The remote API enforces a byte limit on most text and URL fields. Checking
 * it here avoids sending requests that are certain to be rejected. The limit is
 * part of the type (`LimitedStr<100>` is not a `LimitedStr<1000>`), so one
 * wrapper serves every field-level bound.
 */

import { LengthExceededError, UrlParseError } from './errors';
import { err, ok, type Result } from './validation';

const encoder = new TextEncoder();

/**
 * UTF-8 byte length, the unit in which every limit is counted.
 */
export function byteLength(text: string): number {
  return encoder.encode(text).length;
}

export class LimitedStr<L extends number = number> {
  private constructor(
    readonly limit: L,
    readonly value: string
  ) {
    Object.freeze(this);
  }

  static tryFrom<L extends number>(limit: L, value: string): Result<LimitedStr<L>, LengthExceededError> {
    if (byteLength(value) > limit) {
      return err(new LengthExceededError(value, limit));
    }
    return ok(new LimitedStr(limit, value));
  }

  /**
   * Skips the length check.
   *
   * For values already known to fit, such as ones the API itself returned. A
   * value over the limit is not caught here; the API will reject any request
   * that carries it.
   */
  static unchecked<L extends number>(limit: L, value: string): LimitedStr<L> {
    return new LimitedStr(limit, value);
  }

  equals(other: LimitedStr<L>): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export class LimitedUrl<L extends number = number> {
  readonly href: string;

  private constructor(
    readonly limit: L,
    url: URL
  ) {
    this.href = url.href;
    Object.freeze(this);
  }

  /**
   * Checks the raw text against the limit, then parses it.
   */
  static tryFrom<L extends number>(
    limit: L,
    text: string
  ): Result<LimitedUrl<L>, LengthExceededError | UrlParseError> {
    if (byteLength(text) > limit) {
      return err(new LengthExceededError(text, limit, 'url'));
    }

    let url: URL;
    try {
      url = new URL(text);
    } catch (error) {
      return err(new UrlParseError(text, error));
    }
    return ok(new LimitedUrl(limit, url));
  }

  /**
   * Wraps an already parsed URL without checking its length.
   *
   * Same trust boundary as {@link LimitedStr.unchecked}.
   */
  static unchecked<L extends number>(limit: L, url: URL): LimitedUrl<L> {
    return new LimitedUrl(limit, url);
  }

  /** A fresh copy; mutating it does not affect this value. */
  get url(): URL {
    return new URL(this.href);
  }

  equals(other: LimitedUrl<L>): boolean {
    return this.href === other.href;
  }

  toString(): string {
    return this.href;
  }

  toJSON(): string {
    return this.href;
  }
}
