import { randomFillSync } from 'node:crypto';
import { encode } from './encode';
import { blockLength, computeDecodedSize, groupSymbols } from './groups';
import type { RandomSource } from './types';

export const defaultRandomSource: RandomSource = (target) => {
  randomFillSync(target);
};

/**
 * Encodes `byteLength` random bytes. The result is always canonical.
 */
export function randomBytes(
  byteLength: number,
  random: RandomSource = defaultRandomSource,
): string {
  if (!Number.isSafeInteger(byteLength) || byteLength < 0) {
    throw new RangeError(`g60: invalid byte length ${byteLength}`);
  }
  const bytes = new Uint8Array(byteLength);
  random(bytes);
  return encode(bytes);
}

/**
 * A random canonical string of `maxLength` symbols, or one fewer when no
 * encoding has exactly `maxLength` symbols.
 */
export function randomString(
  maxLength: number,
  random: RandomSource = defaultRandomSource,
): string {
  if (!Number.isSafeInteger(maxLength) || maxLength < 0) {
    throw new RangeError(`g60: invalid length ${maxLength}`);
  }
  let length = maxLength;
  const trailing = length % groupSymbols;
  if (trailing !== 0 && blockLength(trailing) === undefined) {
    length -= 1;
  }
  return randomBytes(computeDecodedSize(length) ?? 0, random);
}
