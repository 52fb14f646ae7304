/**
 * Failure categories raised by the chunk codec and PNG container
 */
export type PngErrorKind =
  | 'InvalidFormat'
  | 'MalformedInput'
  | 'IntegrityError'
  | 'EncodingError'
  | 'NotFound';

/**
 * Error thrown by every decode, construct and lookup operation in the core.
 * Branch on `kind`; the message is for humans.
 */
export class PngError extends Error {
  constructor(
    public readonly kind: PngErrorKind,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'PngError';
  }
}

export function isPngError(error: unknown, kind?: PngErrorKind): error is PngError {
  return error instanceof PngError && (kind === undefined || error.kind === kind);
}
