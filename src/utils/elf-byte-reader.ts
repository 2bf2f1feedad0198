/**
 * Bounds-checked little-endian field reads over a window of an ELF image.
 */

import { TextDecoder } from 'node:util';
import { ElfBinaryError, ElfErrorKind } from '../types/elf-error.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Reads fixed-width fields at offsets relative to a window `[start, end)` of a buffer.
 * A read that would leave the window throws instead of touching bytes outside it.
 */
export class ElfByteReader {
  private readonly buffer: Buffer;
  private readonly start: number;
  private readonly end: number;
  readonly label: string;

  constructor(buffer: Buffer, label: string, start: number = 0, end: number = buffer.length) {
    this.buffer = buffer;
    this.label = label;
    this.start = start;
    this.end = end;
  }

  /**
   * Opens a window over `[offset, offset + size)` of the buffer.
   *
   * @param offset - Start of the range, as read from a 64-bit field
   * @param size - Length of the range in bytes
   * @throws {ElfBinaryError} OutOfBounds if the range does not fit in the buffer
   */
  static forRange(buffer: Buffer, label: string, offset: bigint, size: bigint): ElfByteReader {
    const fileSize = BigInt(buffer.length);
    if (offset > fileSize || size > fileSize - offset) {
      throw new ElfBinaryError(
        ElfErrorKind.OutOfBounds,
        `${label} extends beyond file bounds: offset=${offset}, size=${size}, fileSize=${buffer.length}`,
        { label, offset, size, fileSize: buffer.length }
      );
    }
    const start = Number(offset);
    return new ElfByteReader(buffer, label, start, start + Number(size));
  }

  get length(): number {
    return this.end - this.start;
  }

  /**
   * Narrows to `[at, at + size)` of this window.
   */
  slice(at: number, size: number, label: string): ElfByteReader {
    this.ensure(at, size);
    return new ElfByteReader(this.buffer, label, this.start + at, this.start + at + size);
  }

  readUint8(at: number): number {
    this.ensure(at, 1);
    return this.buffer.readUInt8(this.start + at);
  }

  readUint16(at: number): number {
    this.ensure(at, 2);
    return this.buffer.readUInt16LE(this.start + at);
  }

  readUint32(at: number): number {
    this.ensure(at, 4);
    return this.buffer.readUInt32LE(this.start + at);
  }

  readUint64(at: number): bigint {
    this.ensure(at, 8);
    return this.buffer.readBigUInt64LE(this.start + at);
  }

  /**
   * Reads a NUL-terminated UTF-8 string starting at `index`. The terminator must lie inside the window.
   * A leading byte order mark is kept as part of the string.
   *
   * @param index - Offset into the window; a 64-bit string-table index may be passed as is
   * @throws {ElfBinaryError} OutOfBounds if `index` is outside the window or no terminator is found
   * @throws {ElfBinaryError} InvalidEncoding if the bytes are not valid UTF-8
   */
  readCString(index: number | bigint): string {
    if (index < 0 || index >= this.length) {
      throw new ElfBinaryError(
        ElfErrorKind.OutOfBounds,
        `String index ${index} is outside ${this.label} (size=${this.length})`,
        { label: this.label, index, size: this.length }
      );
    }
    const at: number = Number(index);
    const terminator: number = this.buffer.indexOf(0, this.start + at);
    if (terminator === -1 || terminator >= this.end) {
      throw new ElfBinaryError(
        ElfErrorKind.OutOfBounds,
        `String at index ${at} runs past the end of ${this.label} without a terminator`,
        { label: this.label, index: at, size: this.length }
      );
    }
    const bytes: Buffer = this.buffer.subarray(this.start + at, terminator);
    try {
      return utf8Decoder.decode(bytes);
    } catch (error) {
      throw new ElfBinaryError(
        ElfErrorKind.InvalidEncoding,
        `String at index ${at} in ${this.label} is not valid UTF-8`,
        { label: this.label, index: at },
        error
      );
    }
  }

  private ensure(at: number, width: number): void {
    if (at < 0 || width < 0 || at + width > this.length) {
      throw new ElfBinaryError(
        ElfErrorKind.OutOfBounds,
        `Read of ${width} bytes at offset ${at} extends beyond ${this.label} (size=${this.length})`,
        { label: this.label, at, width, size: this.length }
      );
    }
  }
}
