/**
 * elfdeps - Main entry point
 *
 * Lists the shared libraries an ELF64 binary declares as runtime dependencies.
 */

// Core pipeline
export {
  ElfBinary,
  validateHeader,
  readProgramHeaderMeta,
  findDynamicSegment,
  readDynamicSection,
  resolveLibraryNames,
  resolveDynamicStrings,
  resolveDependencies,
  readDynamicInfo,
  isStaticOutcome,
} from './elf-binary.js';
export { ElfBinaryError, ElfErrorKind } from './types/elf-error.js';
export { ElfByteReader } from './utils/elf-byte-reader.js';

// File-level helpers
export { collectDependencies, collectDependenciesForFiles } from './dependencies.js';
export { formatReport } from './report.js';

export type { FileHeaderMeta } from './types/file-header-meta.js';
export type { ProgramHeaderEntry, SegmentType } from './types/program-header-entry.js';
export type { DynamicEntry, DynamicTag, DynamicSectionSummary, DynamicInfo } from './types/dynamic-entry.js';
export type { DependencyReport } from './types/dependency-report.js';
export type { ReportFormat, ReportOptions } from './report.js';
