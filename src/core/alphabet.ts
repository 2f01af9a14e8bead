/**
 * The G60 alphabet: digits, uppercase letters without `I` and `O` (easily
 * mistaken for `1` and `0`), then lowercase letters. A symbol's position is its
 * digit value. The alphabet is ordered by ASCII, so comparing two encodings of
 * the same length compares the digits they carry.
 */
export const alphabet = '0123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
export const radix = 60;

const symbolCodes = Uint8Array.from(alphabet, (symbol) => symbol.charCodeAt(0));
const symbolValues = new Int8Array(128).fill(-1);

symbolCodes.forEach((code, value) => {
  symbolValues[code] = value;
});

const zeroSymbolCode = symbolCodes[0] ?? 0x30;

/**
 * ASCII code of the symbol for a digit value in [0, 59].
 */
export function symbolCode(value: number): number {
  return symbolCodes[value] ?? zeroSymbolCode;
}

/**
 * Digit value of a UTF-16 code unit, or -1 when it is not an alphabet symbol.
 */
export function symbolValue(code: number): number {
  return symbolValues[code] ?? -1;
}
