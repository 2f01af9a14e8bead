import { decode } from './decode';
import { encode } from './encode';
import { decodeUtf8Strict, encodeUtf8 } from './encoding';
import { G60Error } from './errors';

/**
 * Encodes the UTF-8 bytes of `text`. Lone surrogates are replaced with U+FFFD
 * before encoding, so they do not survive a round trip.
 */
export function encodeStr(text: string): string {
  return encode(encodeUtf8(text));
}

/**
 * Decodes `text` and reads the bytes as UTF-8.
 */
export function decodeToString(text: string): string {
  const bytes = decode(text);
  const decoded = decodeUtf8Strict(bytes);
  if (decoded === undefined) {
    throw new G60Error('INVALID_TEXT', 'g60: decoded bytes are not valid UTF-8', { bytes });
  }
  return decoded;
}
