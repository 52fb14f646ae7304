import { test } from 'node:test';
import assert from 'node:assert';
import {
  pngCrc32,
  readUInt32BE,
  writeUInt32BE,
  concatBytes,
  isAsciiAlphabetic,
  isAsciiLowercase,
  isAsciiUppercase,
  isPngSignature,
  PNG_SIGNATURE
} from '../../src/utils.js';
import { utf8 } from '../utils/fixtures.js';

test('pngCrc32 matches the CRC-32 check value', () => {
  assert.strictEqual(pngCrc32(utf8('123456789')), 0xcbf43926);
});

test('pngCrc32 of IEND matches the bytes every PNG ends with', () => {
  assert.strictEqual(pngCrc32(utf8('IEND')), 0xae426082);
});

test('pngCrc32 of empty input is zero', () => {
  assert.strictEqual(pngCrc32(new Uint8Array(0)), 0);
});

test('pngCrc32 honours start and length', () => {
  const data = utf8('xxIENDyy');
  assert.strictEqual(pngCrc32(data, 2, 4), 0xae426082);
  assert.strictEqual(pngCrc32(utf8('xx123456789'), 2), 0xcbf43926);
});

test('readUInt32BE reads big-endian 32-bit integer', () => {
  const buffer = new Uint8Array([0x00, 0x00, 0x00, 0x0D]);
  assert.strictEqual(readUInt32BE(buffer, 0), 13);
});

test('readUInt32BE returns unsigned values above 2^31', () => {
  const buffer = new Uint8Array([0xab, 0xcd, 0xef, 0x4e]);
  assert.strictEqual(readUInt32BE(buffer, 0), 0xabcdef4e);
});

test('writeUInt32BE and readUInt32BE are symmetric', () => {
  const buffer = new Uint8Array(6);
  writeUInt32BE(buffer, 2882656334, 2);
  assert.deepStrictEqual(Array.from(buffer), [0, 0, 0xab, 0xd1, 0xd8, 0x4e]);
  assert.strictEqual(readUInt32BE(buffer, 2), 2882656334);
});

test('ASCII letter predicates', () => {
  assert.ok(isAsciiUppercase(0x41));
  assert.ok(isAsciiUppercase(0x5a));
  assert.ok(!isAsciiUppercase(0x61));
  assert.ok(isAsciiLowercase(0x7a));
  assert.ok(!isAsciiLowercase(0x5a));
  assert.ok(isAsciiAlphabetic(0x61));
  assert.ok(!isAsciiAlphabetic(0x40));
  assert.ok(!isAsciiAlphabetic(0x5b));
  assert.ok(!isAsciiAlphabetic(0x60));
  assert.ok(!isAsciiAlphabetic(0x7b));
  assert.ok(!isAsciiAlphabetic(0x31));
});

test('concatBytes joins parts in order', () => {
  const joined = concatBytes([new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3])]);
  assert.deepStrictEqual(Array.from(joined), [1, 2, 3]);
  assert.strictEqual(concatBytes([]).length, 0);
});

test('isPngSignature validates correct signature', () => {
  assert.ok(isPngSignature(PNG_SIGNATURE));
  assert.deepStrictEqual(Array.from(PNG_SIGNATURE), [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
});

test('isPngSignature rejects short and wrong data', () => {
  assert.ok(!isPngSignature(PNG_SIGNATURE.slice(0, 7)));
  const wrong = PNG_SIGNATURE.slice();
  wrong[7] = 0;
  assert.ok(!isPngSignature(wrong));
});
