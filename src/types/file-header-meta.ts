/**
 * Program header table location, read from the ELF64 file header.
 */
export interface FileHeaderMeta {
  /** `e_phoff`: byte offset of the table from the start of the file. Never zero. */
  readonly programHeaderOffset: bigint;
  /** `e_phentsize` */
  readonly programHeaderEntrySize: number;
  /** `e_phnum` */
  readonly programHeaderEntryCount: number;
}
