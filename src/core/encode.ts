import { symbolCode } from './alphabet';
import { blockToDigits } from './block';
import { decodeAscii } from './encoding';
import { notEnoughSpace } from './errors';
import { blockBytes, computeEncodedSize, groupLength, groupSymbols } from './groups';

/**
 * Encodes bytes as a G60 string. Never fails; empty input gives `''`.
 */
export function encode(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    return '';
  }
  const codes = new Uint8Array(computeEncodedSize(bytes.length));
  writeSymbols(bytes, codes);
  return decodeAscii(codes);
}

/**
 * Writes the ASCII codes of the encoding of `bytes` to the start of `target`
 * and returns how many were written. `target` is left untouched when it is too
 * small.
 */
export function encodeInto(bytes: Uint8Array, target: Uint8Array): number {
  const required = computeEncodedSize(bytes.length);
  if (target.length < required) {
    throw notEnoughSpace(required, target.length);
  }
  return writeSymbols(bytes, target);
}

function writeSymbols(bytes: Uint8Array, target: Uint8Array): number {
  const digits = new Uint8Array(groupSymbols);
  let cursor = 0;
  for (let offset = 0; offset < bytes.length; offset += blockBytes) {
    const block = bytes.subarray(offset, offset + blockBytes);
    blockToDigits(block, digits);
    const symbols = groupLength(block.length);
    for (let i = 0; i < symbols; i += 1) {
      target[cursor] = symbolCode(digits[i] ?? 0);
      cursor += 1;
    }
  }
  return cursor;
}
