import assert from 'node:assert/strict';
import { randomBytes } from 'node:crypto';
import test from 'node:test';
import { alphabet } from './alphabet';
import { encode, encodeInto } from './encode';
import { G60Error } from './errors';
import { computeEncodedSize } from './groups';

const testCases: Array<[number[], string]> = [
  [[], ''],
  [[0], '00'],
  [[1], '0E'],
  [[255], 'zW'],
  [[0, 0], '000'],
  [[0, 1], '003'],
  [[1, 2, 3], '0E620'],
  [[0, 1, 2, 3, 4, 5, 6], '0031LT820W'],
  [[0, 1, 2, 3, 4, 5, 6, 7], '0031LT820W7'],
  [[255, 255, 255, 255, 255, 255, 255, 255], 'zinqfBXiMKF'],
  [[0, 0, 0, 0, 0, 0, 0, 0, 0], '0000000000000'],
  [[0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15], '0031LT820W71sT6hfQ5DAF'],
];

test('encode vectors', () => {
  for (const [input, expected] of testCases) {
    assert.equal(encode(Uint8Array.from(input)), expected, `input ${input.join(',')}`);
  }
});

test('encode Hello, world!', () => {
  const bytes = Uint8Array.from([
    0x48, 0x65, 0x6c, 0x6c, 0x6f, 0x2c, 0x20, 0x77, 0x6f, 0x72, 0x6c, 0x64, 0x21,
  ]);
  assert.equal(encode(bytes), 'Gt4CGFiHehzRzjCF16');
});

test('encode length depends only on input length', () => {
  for (let length = 0; length < 50; length += 1) {
    for (let i = 0; i < 20; i += 1) {
      assert.equal(encode(randomBytes(length)).length, computeEncodedSize(length));
    }
  }
});

test('encode only emits alphabet symbols', () => {
  const encoded = encode(randomBytes(4096));
  for (const char of encoded) {
    assert.ok(alphabet.includes(char), `invalid g60 char: ${char}`);
  }
});

test('encode preserves byte order for equal lengths', () => {
  let prev = '';
  for (let value = 0; value < 256; value += 1) {
    const encoded = encode(Uint8Array.from([value]));
    if (value > 0) {
      assert.ok(encoded > prev, `expected ${encoded} > ${prev}`);
    }
    prev = encoded;
  }

  prev = '';
  for (let value = 0; value < 0x10000; value += 1) {
    const encoded = encode(Uint8Array.from([value >> 8, value & 0xff]));
    if (value > 0) {
      assert.ok(encoded > prev, `expected ${encoded} > ${prev}`);
    }
    prev = encoded;
  }
});

test('encode preserves byte order across the second block', () => {
  const bytes = new Uint8Array(9);
  let prev = '';
  for (let value = 0; value < 0x10000; value += 1) {
    bytes[0] = value >> 8;
    bytes[8] = value & 0xff;
    const encoded = encode(bytes);
    if (value > 0) {
      assert.ok(encoded > prev, `expected ${encoded} > ${prev}`);
    }
    prev = encoded;
  }
});

test('encode is injective over short inputs', () => {
  const seen = new Set<string>();
  seen.add(encode(new Uint8Array()));
  for (let value = 0; value < 256; value += 1) {
    seen.add(encode(Uint8Array.from([value])));
  }
  for (let value = 0; value < 0x10000; value += 1) {
    seen.add(encode(Uint8Array.from([value >> 8, value & 0xff])));
  }
  assert.equal(seen.size, 1 + 256 + 0x10000);
});

test('encode does not modify its input', () => {
  const bytes = randomBytes(21);
  const copy = Uint8Array.from(bytes);
  encode(bytes);
  assert.deepEqual(Array.from(bytes), Array.from(copy));
});

test('encodeInto writes symbol codes and returns the count', () => {
  const target = new Uint8Array(20);
  const written = encodeInto(new TextEncoder().encode('Hello, world!'), target);
  assert.equal(written, 18);
  assert.equal(new TextDecoder().decode(target.subarray(0, written)), 'Gt4CGFiHehzRzjCF16');
  assert.deepEqual(Array.from(target.subarray(18)), [0, 0]);
});

test('encodeInto rejects a short target without writing', () => {
  const target = new Uint8Array(15);
  assert.throws(
    () => encodeInto(new TextEncoder().encode('Hello, world!'), target),
    (error: unknown) =>
      error instanceof G60Error &&
      error.code === 'NOT_ENOUGH_SPACE' &&
      error.details.required === 18 &&
      error.details.actual === 15,
  );
  assert.deepEqual(Array.from(target), new Array(15).fill(0));
});
