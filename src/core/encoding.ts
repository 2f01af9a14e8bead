const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const charCodeChunk = 0x2000;

export function encodeUtf8(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/**
 * Decodes UTF-8, keeping a leading byte-order mark. Returns undefined for
 * malformed input.
 */
export function decodeUtf8Strict(bytes: Uint8Array): string | undefined {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Reads single-byte character codes. Only used on alphabet symbols, which are
 * all ASCII.
 */
export function decodeAscii(codes: Uint8Array): string {
  let text = '';
  for (let offset = 0; offset < codes.length; offset += charCodeChunk) {
    text += String.fromCharCode(...codes.subarray(offset, offset + charCodeChunk));
  }
  return text;
}
