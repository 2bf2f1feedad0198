/**
 * Decoded Elf64_Dyn elements and the subset the resolver works from.
 */
export type DynamicTag = 'needed' | 'strtab' | 'strsz' | 'soname' | 'rpath' | 'runpath' | 'other';

export interface DynamicEntry {
  readonly tag: DynamicTag;
  readonly rawTag: bigint;
  /** An offset, a size or a string-table index, depending on `tag`. */
  readonly value: bigint;
}

export interface DynamicSectionSummary {
  readonly stringTable: DynamicEntry;
  readonly stringTableSize: DynamicEntry;
  /** In the order they appear in the dynamic section. */
  readonly needed: readonly DynamicEntry[];
  readonly soname: DynamicEntry | null;
  readonly rpath: DynamicEntry | null;
  readonly runpath: DynamicEntry | null;
}

/**
 * String-valued dynamic entries resolved through the string table.
 */
export interface DynamicInfo {
  readonly needed: readonly string[];
  readonly soname: string | null;
  readonly rpath: string | null;
  readonly runpath: string | null;
}
