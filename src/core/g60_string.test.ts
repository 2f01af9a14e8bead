import assert from 'node:assert/strict';
import test from 'node:test';
import { G60Error } from './errors';
import { G60String } from './g60_string';

test('G60String.from wraps canonical strings', () => {
  const value = G60String.from('Gt4CGFiHehzRzjCF16');
  assert.equal(value.toString(), 'Gt4CGFiHehzRzjCF16');
  assert.equal(value.length, 18);
  assert.equal(value.decodeToString(), 'Hello, world!');
  assert.equal(JSON.stringify({ id: value }), '{"id":"Gt4CGFiHehzRzjCF16"}');
});

test('G60String.from rejects invalid strings', () => {
  assert.throws(
    () => G60String.from('001'),
    (error: unknown) => error instanceof G60Error && error.code === 'VALUE_OUT_OF_RANGE',
  );
  assert.equal(G60String.tryFrom('001'), undefined);
  assert.equal(G60String.tryFrom('000')?.value, '000');
});

test('G60String.encode and decode', () => {
  const bytes = Uint8Array.from([0, 1, 2, 3, 4]);
  const value = G60String.encode(bytes);
  assert.equal(value.value, '0031LT8');
  assert.deepEqual(Array.from(value.decode()), [0, 1, 2, 3, 4]);
  assert.equal(G60String.encodeStr('Hello, world!').value, 'Gt4CGFiHehzRzjCF16');
});

test('G60String.random uses the given source', () => {
  const value = G60String.random(2, (target) => target.fill(0));
  assert.equal(value.value, '000');
});

test('G60String comparison follows byte order', () => {
  const low = G60String.encode(Uint8Array.from([0x10, 0xff]));
  const high = G60String.encode(Uint8Array.from([0x11, 0x00]));
  assert.equal(low.compare(high), -1);
  assert.equal(high.compare(low), 1);
  assert.equal(low.compare(G60String.from(low.value)), 0);
  assert.ok(low.equals(G60String.from(low.value)));
  assert.ok(!low.equals(high));
});
