import { blockBytes, groupSymbols } from './groups';

/*
 * Layout of one block. Eight bytes are split into small fields whose products
 * line up with base-60 digit boundaries, most significant first:
 *
 *   head = 14*b0 + b1/20          -> d0 d1
 *   d2   = 3*(b1%20) + b2/90
 *   mid  = 2*(b2%90) + b3>>7      -> d3, and mid%3 in d4
 *   low  = 9*(b3&0x7f) + b4/30    -> d4 d5
 *   d6   = 2*(b4%30) + b5/150
 *   tail = 2*(b5%150) + b6/144    -> d7, and tail%5 in d8
 *   d8   = 12*(tail%5) + (b6%144)/12
 *   d9   = 5*(b6%12) + b7/60
 *   d10  = b7%60
 *
 * A short block reads as if right-padded with zeros, so the first k digits of
 * its group depend only on the bytes that are present.
 */

/**
 * Spreads up to eight bytes over eleven digit values. Bytes past the end of
 * `block` read as zero.
 */
export function blockToDigits(
  block: Uint8Array,
  digits: Uint8Array = new Uint8Array(groupSymbols),
): Uint8Array {
  const b0 = block[0] ?? 0;
  const b1 = block[1] ?? 0;
  const b2 = block[2] ?? 0;
  const b3 = block[3] ?? 0;
  const b4 = block[4] ?? 0;
  const b5 = block[5] ?? 0;
  const b6 = block[6] ?? 0;
  const b7 = block[7] ?? 0;

  const head = 14 * b0 + Math.floor(b1 / 20);
  const mid = 2 * (b2 % 90) + (b3 >> 7);
  const low = 9 * (b3 & 0x7f) + Math.floor(b4 / 30);
  const tail = 2 * (b5 % 150) + Math.floor(b6 / 144);

  digits[0] = Math.floor(head / 60);
  digits[1] = head % 60;
  digits[2] = 3 * (b1 % 20) + Math.floor(b2 / 90);
  digits[3] = Math.floor(mid / 3);
  digits[4] = 20 * (mid % 3) + Math.floor(low / 60);
  digits[5] = low % 60;
  digits[6] = 2 * (b4 % 30) + Math.floor(b5 / 150);
  digits[7] = Math.floor(tail / 5);
  digits[8] = 12 * (tail % 5) + Math.floor((b6 % 144) / 12);
  digits[9] = 5 * (b6 % 12) + Math.floor(b7 / 60);
  digits[10] = b7 % 60;
  return digits;
}

/**
 * Rebuilds the `byteCount` bytes of one group. Digits past the end of `digits`
 * read as zero. Returns undefined when the digits are not exactly what
 * `blockToDigits` produces for some block of that size.
 */
export function digitsToBlock(digits: Uint8Array, byteCount: number): Uint8Array | undefined {
  const d0 = digits[0] ?? 0;
  const d1 = digits[1] ?? 0;
  const d2 = digits[2] ?? 0;
  const d3 = digits[3] ?? 0;
  const d4 = digits[4] ?? 0;
  const d5 = digits[5] ?? 0;
  const d6 = digits[6] ?? 0;
  const d7 = digits[7] ?? 0;
  const d8 = digits[8] ?? 0;
  const d9 = digits[9] ?? 0;
  const d10 = digits[10] ?? 0;

  const head = 60 * d0 + d1;
  const mid = 3 * d3 + Math.floor(d4 / 20);
  const low = 60 * (d4 % 20) + d5;
  const tail = 60 * d7 + d8;

  const fields = [
    Math.floor(head / 14),
    20 * (head % 14) + Math.floor(d2 / 3),
    90 * (d2 % 3) + (mid >> 1),
    128 * (mid & 1) + Math.floor(low / 9),
    30 * (low % 9) + (d6 >> 1),
    150 * (d6 & 1) + Math.floor(tail / 24),
    12 * (tail % 24) + Math.floor(d9 / 5),
    60 * (d9 % 5) + d10,
  ];

  for (let i = 0; i < blockBytes; i += 1) {
    const field = fields[i] ?? 0;
    if (field > 0xff || (i >= byteCount && field !== 0)) {
      return undefined;
    }
  }

  const block = Uint8Array.from(fields.slice(0, byteCount));
  const expected = blockToDigits(block);
  for (let i = 0; i < digits.length; i += 1) {
    if (expected[i] !== digits[i]) {
      return undefined;
    }
  }
  return block;
}
