/**
 * Fixed ELF64 layout values used while walking a little-endian image.
 */

/** `0x7F 'E' 'L' 'F'` at the start of every ELF object. */
export const ELF_MAGIC: readonly number[] = [0x7f, 0x45, 0x4c, 0x46] as const;

export const EI_CLASS = 4;
export const EI_DATA = 5;
export const ELFCLASS64 = 2;
export const ELFDATA2LSB = 1;

/** Size of the ELF64 file header; every fixed-offset header field lies inside it. */
export const ELF64_HEADER_SIZE = 64;

export const E_PHOFF_OFFSET = 0x20;
export const E_PHENTSIZE_OFFSET = 0x36;
export const E_PHNUM_OFFSET = 0x38;

// Program header entry fields, relative to the entry start.
export const P_TYPE_OFFSET = 0x00;
export const P_OFFSET_OFFSET = 0x08;
export const P_FILESZ_OFFSET = 0x20;

export const PT_DYNAMIC = 2;

/** Each Elf64_Dyn is an 8-byte tag followed by an 8-byte value. */
export const DYNAMIC_ENTRY_SIZE = 16;
export const D_VAL_OFFSET = 0x08;

export const DT_NEEDED = 1n;
export const DT_STRTAB = 5n;
export const DT_STRSZ = 10n;
export const DT_SONAME = 14n;
export const DT_RPATH = 15n;
export const DT_RUNPATH = 29n;
