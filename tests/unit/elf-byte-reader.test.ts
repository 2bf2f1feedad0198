import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ElfBinaryError, ElfErrorKind } from '../../src/types/elf-error.js';
import { ElfByteReader } from '../../src/utils/elf-byte-reader.js';

const bytes = Buffer.from([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x09, 0x0a]);

const outOfBounds = { name: 'ElfBinaryError', kind: ElfErrorKind.OutOfBounds };

void test('reads little-endian fields across the whole buffer', () => {
  const reader = new ElfByteReader(bytes, 'image');
  assert.equal(reader.length, 10);
  assert.equal(reader.readUint8(9), 0x0a);
  assert.equal(reader.readUint16(0), 0x0201);
  assert.equal(reader.readUint32(0), 0x04030201);
  assert.equal(reader.readUint64(0), 0x0807060504030201n);
  assert.equal(reader.readUint64(2), 0x0a09080706050403n);
});

void test('offsets are relative to the window and reads may not leave it', () => {
  const reader = new ElfByteReader(bytes, 'window', 2, 6);
  assert.equal(reader.readUint16(0), 0x0403);
  assert.equal(reader.readUint32(0), 0x06050403);
  assert.throws(() => reader.readUint32(1), outOfBounds);
  assert.throws(() => reader.readUint8(4), outOfBounds);
  assert.throws(() => reader.readUint8(-1), outOfBounds);
});

void test('slice narrows within bounds and rejects ranges past the end', () => {
  const reader = new ElfByteReader(bytes, 'image');
  const entry = reader.slice(4, 4, 'entry');
  assert.equal(entry.length, 4);
  assert.equal(entry.readUint32(0), 0x08070605);
  assert.throws(() => reader.slice(8, 4, 'entry'), outOfBounds);
});

void test('forRange checks 64-bit ranges against the buffer length', () => {
  assert.equal(ElfByteReader.forRange(bytes, 'range', 10n, 0n).length, 0);
  assert.equal(ElfByteReader.forRange(bytes, 'range', 4n, 6n).readUint16(0), 0x0605);
  assert.throws(() => ElfByteReader.forRange(bytes, 'range', 8n, 3n), outOfBounds);
  assert.throws(() => ElfByteReader.forRange(bytes, 'range', 11n, 0n), outOfBounds);
  assert.throws(() => ElfByteReader.forRange(bytes, 'range', 0xffffffffffffffffn, 1n), outOfBounds);
});

void test('forRange errors carry the label and requested range', () => {
  try {
    ElfByteReader.forRange(bytes, 'string table', 8n, 3n);
    assert.fail('expected OutOfBounds');
  } catch (error) {
    assert.ok(error instanceof ElfBinaryError);
    assert.equal(error.message, 'string table extends beyond file bounds: offset=8, size=3, fileSize=10');
  }
});

void test('readCString stops at the terminator', () => {
  const table = new ElfByteReader(Buffer.from('\0abc\0de', 'utf8'), 'strtab');
  assert.equal(table.readCString(0), '');
  assert.equal(table.readCString(1), 'abc');
  assert.equal(table.readCString(2), 'bc');
});

void test('readCString requires a terminator inside the window', () => {
  const table = new ElfByteReader(Buffer.from('\0abc\0de', 'utf8'), 'strtab');
  assert.throws(() => table.readCString(5), outOfBounds);
  assert.throws(() => table.readCString(7), outOfBounds);

  // The NUL at index 4 lies just past a four-byte window.
  const narrow = new ElfByteReader(Buffer.from('\0abc\0', 'utf8'), 'strtab', 0, 4);
  assert.throws(() => narrow.readCString(1), outOfBounds);
});

void test('readCString decodes UTF-8 and rejects invalid sequences', () => {
  const valid = new ElfByteReader(Buffer.from('lïb\0', 'utf8'), 'strtab');
  assert.equal(valid.readCString(0), 'lïb');

  const invalid = new ElfByteReader(Buffer.from([0xc3, 0x28, 0x00]), 'strtab');
  assert.throws(() => invalid.readCString(0), { name: 'ElfBinaryError', kind: ElfErrorKind.InvalidEncoding });
});

void test('readCString keeps a leading byte order mark', () => {
  const table = new ElfByteReader(Buffer.from('\0\uFEFFlibx.so\0', 'utf8'), 'strtab');
  const name = table.readCString(1);
  assert.equal(name, '\uFEFFlibx.so');
  assert.equal(name.length, 8);
});

void test('readCString takes 64-bit indices and rejects those past the window', () => {
  const table = new ElfByteReader(Buffer.from('\0abc\0', 'utf8'), 'strtab');
  assert.equal(table.readCString(1n), 'abc');
  assert.throws(() => table.readCString(5n), outOfBounds);
  assert.throws(() => table.readCString(0xffffffffffffffffn), outOfBounds);
});
