/**
 * Failure kinds surfaced by the embed and extract pipelines
 */
export type StegoErrorKind =
  | 'ArgumentError'
  | 'FileOpenError'
  | 'InsufficientCapacity'
  | 'NotSteganographicImage'
  | 'CorruptContainer'
  | 'ExtensionTooLong'
  | 'TruncatedStegoImage'
  | 'TruncatedRead'
  | 'IOError'
  | 'InvalidInput'
  | 'EncodeError';

/**
 * Pipeline stages, in the order an encode or decode walks through them
 */
export type StegoStage =
  | 'open'
  | 'capacity'
  | 'header'
  | 'signature'
  | 'extension'
  | 'size'
  | 'payload'
  | 'remainder';

export class StegoError extends Error {
  readonly kind: StegoErrorKind;
  stage?: StegoStage;

  constructor(
    kind: StegoErrorKind,
    message: string,
    options?: { stage?: StegoStage; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StegoError';
    this.kind = kind;
    this.stage = options?.stage;
  }
}

export function isStegoError(error: unknown): error is StegoError {
  return error instanceof StegoError;
}

/**
 * Normalize anything thrown inside a pipeline. Errors that already carry a
 * kind keep it; the stage is filled in only when the thrower left it empty.
 */
export function toStegoError(error: unknown, stage?: StegoStage): StegoError {
  if (isStegoError(error)) {
    if (!error.stage && stage) {
      error.stage = stage;
    }
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new StegoError('IOError', message, { stage, cause: error });
}

/**
 * Human-readable label for a stage, used in failure messages
 */
export function describeStage(stage: StegoStage): string {
  switch (stage) {
    case 'open':
      return 'opening files';
    case 'capacity':
      return 'capacity check';
    case 'header':
      return 'image header';
    case 'signature':
      return 'signature';
    case 'extension':
      return 'file extension';
    case 'size':
      return 'file size';
    case 'payload':
      return 'file data';
    case 'remainder':
      return 'remaining image data';
  }
}
