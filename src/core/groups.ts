export const blockBytes = 8;
export const groupSymbols = 11;

/**
 * Symbols needed for a block of each byte count: the smallest k with
 * 60^k >= 256^n.
 */
const blockToGroupLength = new Map<number, number>([
  [1, 2],
  [2, 3],
  [3, 5],
  [4, 6],
  [5, 7],
  [6, 9],
  [7, 10],
  [8, 11],
]);
const groupToBlockLength = new Map<number, number>();

for (const [size, symbols] of blockToGroupLength) {
  groupToBlockLength.set(symbols, size);
}

/**
 * Number of symbols in the group encoding a block of `byteCount` bytes.
 */
export function groupLength(byteCount: number): number {
  const symbols = blockToGroupLength.get(byteCount);
  if (symbols === undefined) {
    throw new RangeError(`g60: unsupported block size ${byteCount}`);
  }
  return symbols;
}

/**
 * Byte count of the block behind a group of `symbolCount` symbols, or
 * undefined when no block encodes to that many symbols (1, 4 and 8).
 */
export function blockLength(symbolCount: number): number | undefined {
  return groupToBlockLength.get(symbolCount);
}

export function computeEncodedSize(byteLength: number): number {
  assertLength(byteLength);
  const trailing = byteLength % blockBytes;
  const full = (byteLength - trailing) / blockBytes;
  return full * groupSymbols + (trailing === 0 ? 0 : groupLength(trailing));
}

/**
 * Byte length decoded from `symbolLength` symbols, or undefined when the
 * trailing group has an impossible length.
 */
export function computeDecodedSize(symbolLength: number): number | undefined {
  assertLength(symbolLength);
  const trailing = symbolLength % groupSymbols;
  const full = (symbolLength - trailing) / groupSymbols;
  if (trailing === 0) {
    return full * blockBytes;
  }
  const size = blockLength(trailing);
  return size === undefined ? undefined : full * blockBytes + size;
}

function assertLength(length: number): void {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(`g60: invalid length ${length}`);
  }
}
