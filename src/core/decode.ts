import { symbolValue } from './alphabet';
import { digitsToBlock } from './block';
import { G60Error, notEnoughSpace } from './errors';
import { blockLength, computeDecodedSize, groupSymbols } from './groups';

export type DecodeResult = { ok: true; bytes: Uint8Array } | { ok: false; error: G60Error };

/**
 * Decodes a G60 string. Throws a `G60Error` unless `text` is exactly the
 * encoding of some byte sequence.
 */
export function decode(text: string): Uint8Array {
  const digits = readDigits(text);
  const byteLength = computeDecodedSize(digits.length);
  if (byteLength === undefined) {
    throw invalidLength(text.length);
  }

  const result = new Uint8Array(byteLength);
  let cursor = 0;
  for (let offset = 0; offset < digits.length; offset += groupSymbols) {
    const group = digits.subarray(offset, offset + groupSymbols);
    const size = blockLength(group.length);
    if (size === undefined) {
      throw invalidLength(text.length);
    }
    const block = digitsToBlock(group, size);
    if (!block) {
      throw new G60Error(
        'VALUE_OUT_OF_RANGE',
        `g60: group at index ${offset} is not a canonical encoding of ${size} bytes`,
        { index: offset },
      );
    }
    result.set(block, cursor);
    cursor += size;
  }
  return result;
}

export function tryDecode(text: string): DecodeResult {
  try {
    return { ok: true, bytes: decode(text) };
  } catch (error) {
    if (error instanceof G60Error) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Decodes into the start of `target` and returns the number of bytes written.
 * `target` is left untouched when decoding fails or it is too small.
 */
export function decodeInto(text: string, target: Uint8Array): number {
  const bytes = decode(text);
  if (target.length < bytes.length) {
    throw notEnoughSpace(bytes.length, target.length);
  }
  target.set(bytes);
  return bytes.length;
}

function readDigits(text: string): Uint8Array {
  const digits = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i += 1) {
    const code = text.charCodeAt(i);
    const value = symbolValue(code);
    if (value < 0) {
      const character = String.fromCodePoint(text.codePointAt(i) ?? code);
      throw new G60Error(
        'INVALID_CHARACTER',
        `g60: invalid character ${JSON.stringify(character)} at index ${i}`,
        { index: i, character },
      );
    }
    digits[i] = value;
  }
  return digits;
}

function invalidLength(length: number): G60Error {
  return new G60Error('INVALID_LENGTH', `g60: invalid length ${length}`, { length });
}
