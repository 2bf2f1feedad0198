/**
 * ELF64 helpers for listing the shared libraries a binary declares as DT_NEEDED.
 */
import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import {
  D_VAL_OFFSET,
  DT_NEEDED,
  DT_RPATH,
  DT_RUNPATH,
  DT_SONAME,
  DT_STRSZ,
  DT_STRTAB,
  DYNAMIC_ENTRY_SIZE,
  E_PHENTSIZE_OFFSET,
  E_PHNUM_OFFSET,
  E_PHOFF_OFFSET,
  EI_CLASS,
  EI_DATA,
  ELF64_HEADER_SIZE,
  ELF_MAGIC,
  ELFCLASS64,
  ELFDATA2LSB,
  P_FILESZ_OFFSET,
  P_OFFSET_OFFSET,
  P_TYPE_OFFSET,
  PT_DYNAMIC,
} from './constants/elf-constants.js';
import type { DynamicEntry, DynamicInfo, DynamicSectionSummary, DynamicTag } from './types/dynamic-entry.js';
import { ElfBinaryError, ElfErrorKind } from './types/elf-error.js';
import type { FileHeaderMeta } from './types/file-header-meta.js';
import type { ProgramHeaderEntry, SegmentType } from './types/program-header-entry.js';
import { ElfByteReader } from './utils/elf-byte-reader.js';

/**
 * Validates the ELF identification bytes.
 * @param buffer - File buffer to check
 * @throws {ElfBinaryError} NotElf if the magic is missing, UnsupportedFormat unless 64-bit little-endian
 */
export function validateHeader(buffer: Buffer): void {
  const hasMagic: boolean = buffer.length >= ELF_MAGIC.length && ELF_MAGIC.every((byte, index) => buffer[index] === byte);
  if (!hasMagic) {
    throw new ElfBinaryError(ElfErrorKind.NotElf, 'Not an ELF file: first four bytes do not match the ELF magic');
  }
  if (buffer.length <= EI_DATA) {
    throw new ElfBinaryError(ElfErrorKind.TruncatedHeader, `File too small to hold the ELF identification: ${buffer.length} bytes`);
  }
  const elfClass: number = buffer[EI_CLASS];
  const elfData: number = buffer[EI_DATA];
  if (elfClass !== ELFCLASS64 || elfData !== ELFDATA2LSB) {
    throw new ElfBinaryError(
      ElfErrorKind.UnsupportedFormat,
      `Unsupported ELF format: class=${elfClass}, data=${elfData} (only 64-bit little-endian objects are supported)`,
      { elfClass, elfData }
    );
  }
}

/**
 * Reads the program header table location from the file header.
 * @param buffer - Validated file buffer
 * @returns Table metadata, or null when `e_phoff` is zero (no program headers)
 * @throws {ElfBinaryError} TruncatedHeader if the buffer is shorter than the ELF64 header
 */
export function readProgramHeaderMeta(buffer: Buffer): FileHeaderMeta | null {
  if (buffer.length < ELF64_HEADER_SIZE) {
    throw new ElfBinaryError(
      ElfErrorKind.TruncatedHeader,
      `File too small to hold an ELF64 header: ${buffer.length} bytes, need ${ELF64_HEADER_SIZE}`
    );
  }
  const header = new ElfByteReader(buffer, 'file header', 0, ELF64_HEADER_SIZE);
  const programHeaderOffset: bigint = header.readUint64(E_PHOFF_OFFSET);
  if (programHeaderOffset === 0n) {
    return null;
  }
  return {
    programHeaderOffset,
    programHeaderEntrySize: header.readUint16(E_PHENTSIZE_OFFSET),
    programHeaderEntryCount: header.readUint16(E_PHNUM_OFFSET),
  };
}

function toSegmentType(rawType: number): SegmentType {
  return rawType === PT_DYNAMIC ? 'dynamic' : 'other';
}

function parseProgramHeader(entry: ElfByteReader): ProgramHeaderEntry {
  const rawType: number = entry.readUint32(P_TYPE_OFFSET);
  return {
    segmentType: toSegmentType(rawType),
    rawType,
    fileOffset: entry.readUint64(P_OFFSET_OFFSET),
    fileSize: entry.readUint64(P_FILESZ_OFFSET),
  };
}

/**
 * Walks the program header table and returns the first PT_DYNAMIC entry.
 *
 * @param buffer - Validated file buffer
 * @param meta - Program header table location
 * @returns The dynamic segment's program header
 * @throws {ElfBinaryError} OutOfBounds if the table or an entry field falls outside the file
 * @throws {ElfBinaryError} MissingDynamicSegment if there is no PT_DYNAMIC entry (statically linked)
 */
export function findDynamicSegment(buffer: Buffer, meta: FileHeaderMeta): ProgramHeaderEntry {
  const entrySize: number = meta.programHeaderEntrySize;
  const entryCount: number = meta.programHeaderEntryCount;
  const table = ElfByteReader.forRange(buffer, 'program header table', meta.programHeaderOffset, BigInt(entrySize * entryCount));

  const dynamicEntries: ProgramHeaderEntry[] = [];
  for (let index = 0; index < entryCount; index++) {
    const entry: ProgramHeaderEntry = parseProgramHeader(table.slice(index * entrySize, entrySize, `program header ${index}`));
    if (entry.segmentType === 'dynamic') {
      dynamicEntries.push(entry);
    }
  }

  if (dynamicEntries.length === 0) {
    throw new ElfBinaryError(
      ElfErrorKind.MissingDynamicSegment,
      'No PT_DYNAMIC segment found: the file is statically linked or has no dynamic section',
      { entryCount }
    );
  }
  if (dynamicEntries.length > 1) {
    console.warn(`Program header table contains ${dynamicEntries.length} PT_DYNAMIC entries; using the first`);
  }
  return dynamicEntries[0];
}

function toDynamicTag(rawTag: bigint): DynamicTag {
  switch (rawTag) {
    case DT_NEEDED:
      return 'needed';
    case DT_STRTAB:
      return 'strtab';
    case DT_STRSZ:
      return 'strsz';
    case DT_SONAME:
      return 'soname';
    case DT_RPATH:
      return 'rpath';
    case DT_RUNPATH:
      return 'runpath';
    default:
      return 'other';
  }
}

function parseDynamicEntries(section: ElfByteReader): DynamicEntry[] {
  const entries: DynamicEntry[] = [];
  for (let at = 0; at < section.length; at += DYNAMIC_ENTRY_SIZE) {
    const rawTag: bigint = section.readUint64(at);
    const value: bigint = section.readUint64(at + D_VAL_OFFSET);
    entries.push({ tag: toDynamicTag(rawTag), rawTag, value });
  }
  return entries;
}

/**
 * Decodes the dynamic section and keeps the entries that dependency resolution needs.
 *
 * @param buffer - Validated file buffer
 * @param segment - The PT_DYNAMIC program header
 * @returns String table location and size, DT_NEEDED entries in declaration order, and optional SONAME/RPATH/RUNPATH
 * @throws {ElfBinaryError} OutOfBounds if the segment (or a trailing partial element) falls outside the file
 * @throws {ElfBinaryError} MissingStringTable / MissingStringTableSize if DT_STRTAB / DT_STRSZ is absent
 */
export function readDynamicSection(buffer: Buffer, segment: ProgramHeaderEntry): DynamicSectionSummary {
  const section = ElfByteReader.forRange(buffer, 'dynamic segment', segment.fileOffset, segment.fileSize);
  const entries: DynamicEntry[] = parseDynamicEntries(section);
  const first = (tag: DynamicTag): DynamicEntry | null => entries.find((entry) => entry.tag === tag) ?? null;

  const stringTable = first('strtab');
  if (!stringTable) {
    throw new ElfBinaryError(ElfErrorKind.MissingStringTable, 'Dynamic section has no DT_STRTAB entry');
  }
  // The size comes from DT_STRSZ itself, never from the DT_STRTAB entry.
  const stringTableSize = first('strsz');
  if (!stringTableSize) {
    throw new ElfBinaryError(ElfErrorKind.MissingStringTableSize, 'Dynamic section has no DT_STRSZ entry');
  }

  return {
    stringTable,
    stringTableSize,
    needed: entries.filter((entry) => entry.tag === 'needed'),
    soname: first('soname'),
    rpath: first('rpath'),
    runpath: first('runpath'),
  };
}

function openStringTable(buffer: Buffer, summary: DynamicSectionSummary): ElfByteReader {
  return ElfByteReader.forRange(buffer, 'string table', summary.stringTable.value, summary.stringTableSize.value);
}

/**
 * Resolves each DT_NEEDED index into a library name, preserving declaration order.
 *
 * @param buffer - Validated file buffer
 * @param summary - Decoded dynamic section
 * @returns Library names, one per DT_NEEDED entry
 * @throws {ElfBinaryError} OutOfBounds if the table or a name falls outside its bounds
 * @throws {ElfBinaryError} InvalidEncoding if a name is not valid UTF-8
 */
export function resolveLibraryNames(buffer: Buffer, summary: DynamicSectionSummary): string[] {
  const table: ElfByteReader = openStringTable(buffer, summary);
  return summary.needed.map((entry) => table.readCString(entry.value));
}

/**
 * Resolves DT_NEEDED plus the optional DT_SONAME, DT_RPATH and DT_RUNPATH strings.
 */
export function resolveDynamicStrings(buffer: Buffer, summary: DynamicSectionSummary): DynamicInfo {
  const table: ElfByteReader = openStringTable(buffer, summary);
  const optional = (entry: DynamicEntry | null): string | null => (entry ? table.readCString(entry.value) : null);
  return {
    needed: summary.needed.map((entry) => table.readCString(entry.value)),
    soname: optional(summary.soname),
    rpath: optional(summary.rpath),
    runpath: optional(summary.runpath),
  };
}

function locateDynamicSection(buffer: Buffer): DynamicSectionSummary {
  validateHeader(buffer);
  const meta: FileHeaderMeta | null = readProgramHeaderMeta(buffer);
  if (!meta) {
    throw new ElfBinaryError(ElfErrorKind.NoProgramHeaders, 'ELF file has no program headers (e_phoff is zero)');
  }
  const segment: ProgramHeaderEntry = findDynamicSegment(buffer, meta);
  return readDynamicSection(buffer, segment);
}

/**
 * Lists the shared libraries an ELF64 little-endian image declares as DT_NEEDED, in declaration order.
 *
 * @param buffer - Complete file contents
 * @throws {ElfBinaryError} For any malformed, unsupported or non-dynamic image
 */
export function resolveDependencies(buffer: Buffer): string[] {
  return resolveLibraryNames(buffer, locateDynamicSection(buffer));
}

/**
 * Same pipeline as {@link resolveDependencies}, also resolving SONAME, RPATH and RUNPATH.
 */
export function readDynamicInfo(buffer: Buffer): DynamicInfo {
  return resolveDynamicStrings(buffer, locateDynamicSection(buffer));
}

/**
 * True when the error means "nothing to resolve" (no program headers, or statically linked)
 * rather than a malformed file.
 */
export function isStaticOutcome(error: unknown): boolean {
  return (
    error instanceof ElfBinaryError &&
    (error.kind === ElfErrorKind.NoProgramHeaders || error.kind === ElfErrorKind.MissingDynamicSegment)
  );
}

/**
 * ELF64 binary access utilities.
 */
export class ElfBinary {
  /** Error class for ELF-specific exceptions. */
  static readonly Error: typeof ElfBinaryError = ElfBinaryError;

  /**
   * Reads an entire file into memory.
   *
   * @param filePath - Path to the executable or shared object
   * @throws {ElfBinaryError} IoFailure carrying the underlying error as `cause`
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<Buffer> {
    try {
      return await readFile(filePath);
    } catch (error) {
      throw new ElfBinaryError(
        ElfErrorKind.IoFailure,
        error instanceof Error ? error.message : String(error),
        { filePath },
        error
      );
    }
  }

  static resolveDependencies({ buffer }: { readonly buffer: Buffer }): string[] {
    return resolveDependencies(buffer);
  }

  static readDynamicInfo({ buffer }: { readonly buffer: Buffer }): DynamicInfo {
    return readDynamicInfo(buffer);
  }

  /**
   * Computes the SHA256 of a whole image.
   *
   * @returns Hexadecimal SHA256 hash string
   */
  static hashImage({ buffer }: { readonly buffer: Buffer }): string {
    return createHash('sha256').update(buffer).digest('hex');
  }
}
