import assert from 'node:assert/strict';
import { test } from 'node:test';
import { REPLACEMENT_CHARACTER, describeRawField, sanitizeField, sanitizeRecord } from '../src/encoding';

const bytes = (...values: number[]) => Buffer.from(values);

test('valid text is returned unchanged', () => {
  const text = 'Crème brûlée, 東京 😀';
  assert.equal(sanitizeField(Buffer.from(text, 'utf8')), text);
});

test('leading byte order mark is kept', () => {
  assert.equal(sanitizeField(bytes(0xef, 0xbb, 0xbf, 0x61)), '\uFEFFa');
});

test('a stray byte becomes one replacement character', () => {
  assert.equal(sanitizeField(bytes(0x61, 0xff, 0x62)), `a${REPLACEMENT_CHARACTER}b`);
});

test('a truncated sequence is replaced as one span and decoding resumes', () => {
  // E6 97 is the start of a three-byte sequence cut short by "x"
  assert.equal(sanitizeField(bytes(0xe6, 0x97, 0x78)), `${REPLACEMENT_CHARACTER}x`);
});

test('every invalid span is repaired, not only the first', () => {
  assert.equal(
    sanitizeField(bytes(0x80, 0x41, 0xc3, 0x42, 0xf0, 0x9f, 0x98)),
    `${REPLACEMENT_CHARACTER}A${REPLACEMENT_CHARACTER}B${REPLACEMENT_CHARACTER}`
  );
});

test('overlong and surrogate encodings are rejected byte by byte', () => {
  assert.equal(sanitizeField(bytes(0xc0, 0xaf)), REPLACEMENT_CHARACTER.repeat(2));
  assert.equal(sanitizeField(bytes(0xed, 0xa0, 0x80)), REPLACEMENT_CHARACTER.repeat(3));
});

test('sanitizeRecord repairs each field independently', () => {
  const record = sanitizeRecord([bytes(0x41), bytes(0xfe), Buffer.alloc(0)]);
  assert.deepEqual([...record], ['A', REPLACEMENT_CHARACTER, '']);
});

test('describeRawField shows invalid bytes as hex escapes', () => {
  assert.equal(describeRawField(bytes(0x61, 0xff, 0xe6, 0x97, 0x62)), 'a\\xff\\xe6\\x97b');
});
