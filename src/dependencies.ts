/**
 * File-level dependency collection: reads a binary from disk and reports what it links against.
 */

import { basename } from 'node:path';
import { ElfBinary } from './elf-binary.js';
import type { DependencyReport } from './types/dependency-report.js';
import type { DynamicInfo } from './types/dynamic-entry.js';
import { ElfBinaryError, ElfErrorKind } from './types/elf-error.js';

/**
 * Load an ELF file and list its declared dependencies.
 *
 * @param filePath - Path to the executable or shared object
 * @returns Report with DT_NEEDED names in declaration order, optional SONAME/RPATH/RUNPATH and file hash
 * @throws ElfBinaryError from the read or the pipeline, unchanged; any other failure as IoFailure
 */
export async function collectDependencies(filePath: string): Promise<DependencyReport> {
  try {
    const buffer: Buffer = await ElfBinary.read({ filePath });
    const info: DynamicInfo = ElfBinary.readDynamicInfo({ buffer });

    return {
      filename: basename(filePath),
      sha256: ElfBinary.hashImage({ buffer }),
      totalSize: buffer.length,
      ...info,
    };
  } catch (error) {
    if (error instanceof ElfBinaryError) {
      throw error;
    }
    throw new ElfBinaryError(
      ElfErrorKind.IoFailure,
      `Failed to collect dependencies from "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
      { filePath },
      error
    );
  }
}

/**
 * Collect dependency reports for several files. Each file is parsed independently.
 *
 * @param filePaths - Paths to ELF files
 * @returns Reports in the same order as `filePaths`
 * @throws ElfBinaryError of whichever file fails first in time, not necessarily the first in input order
 */
export async function collectDependenciesForFiles(filePaths: readonly string[]): Promise<DependencyReport[]> {
  return Promise.all(filePaths.map((filePath) => collectDependencies(filePath)));
}
