/**
 * The program header fields needed to find the dynamic section.
 */
export type SegmentType = 'dynamic' | 'other';

export interface ProgramHeaderEntry {
  readonly segmentType: SegmentType;
  readonly rawType: number;
  readonly fileOffset: bigint;
  readonly fileSize: bigint;
}
