import type { DynamicInfo } from './dynamic-entry.js';

/**
 * Dependency listing for a single file on disk.
 */
export interface DependencyReport extends DynamicInfo {
  /** Base name of the inspected file. */
  readonly filename: string;
  /** SHA256 of the entire file. */
  readonly sha256: string;
  /** Total size of the file in bytes. */
  readonly totalSize: number;
}
