/**
 * Error taxonomy for ELF dependency resolution.
 */
export enum ElfErrorKind {
  IoFailure = 'IoFailure',
  NotElf = 'NotElf',
  UnsupportedFormat = 'UnsupportedFormat',
  TruncatedHeader = 'TruncatedHeader',
  NoProgramHeaders = 'NoProgramHeaders',
  MissingDynamicSegment = 'MissingDynamicSegment',
  MissingStringTable = 'MissingStringTable',
  MissingStringTableSize = 'MissingStringTableSize',
  OutOfBounds = 'OutOfBounds',
  InvalidEncoding = 'InvalidEncoding',
}

/**
 * Raised by every stage of the pipeline; `kind` tells callers which structure failed.
 */
export class ElfBinaryError extends Error {
  readonly kind: ElfErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(kind: ElfErrorKind, message: string, context?: Record<string, unknown>, public readonly cause?: unknown) {
    super(message);
    this.name = 'ElfBinaryError';
    this.kind = kind;
    this.context = context;
  }
}
