import { decode } from './decode';
import { encode } from './encode';
import { randomBytes } from './random';
import { decodeToString, encodeStr } from './text';
import type { RandomSource } from './types';
import { isValid, verify } from './verify';

/**
 * A string known to be a canonical G60 encoding, so decoding it cannot fail.
 */
export class G60String {
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Wraps an already encoded string, throwing a `G60Error` when it is not a
   * canonical encoding.
   */
  static from(text: string): G60String {
    verify(text);
    return new G60String(text);
  }

  static tryFrom(text: string): G60String | undefined {
    return isValid(text) ? new G60String(text) : undefined;
  }

  static encode(bytes: Uint8Array): G60String {
    return new G60String(encode(bytes));
  }

  static encodeStr(text: string): G60String {
    return new G60String(encodeStr(text));
  }

  static random(byteLength: number, random?: RandomSource): G60String {
    return new G60String(randomBytes(byteLength, random));
  }

  get length(): number {
    return this.value.length;
  }

  decode(): Uint8Array {
    return decode(this.value);
  }

  /**
   * Throws a `G60Error` with code `INVALID_TEXT` when the bytes are not UTF-8.
   */
  decodeToString(): string {
    return decodeToString(this.value);
  }

  equals(other: G60String): boolean {
    return this.value === other.value;
  }

  /**
   * Orders by symbols. For encodings of equal length this is the order of the
   * encoded bytes.
   */
  compare(other: G60String): number {
    return this.value < other.value ? -1 : this.value > other.value ? 1 : 0;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
