/**
 * Failures raised inside the codec. Boundary calls map the truncation kinds
 * onto result values; CapacityExceeded always propagates.
 */
export type CodecErrorKind = 'TruncatedHeader' | 'TruncatedPayload' | 'CapacityExceeded';

export class CodecError extends Error {
  readonly kind: CodecErrorKind;

  constructor(kind: CodecErrorKind, message: string) {
    super(message);
    this.name = 'CodecError';
    this.kind = kind;
  }
}

export function isCodecError(error: unknown, kind?: CodecErrorKind): error is CodecError {
  return error instanceof CodecError && (kind === undefined || error.kind === kind);
}
