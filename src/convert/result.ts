export type ConvertFailureKind =
  | 'SourceUnavailable'
  | 'InvalidImage'
  | 'TruncatedHeader'
  | 'TruncatedPayload'
  | 'DestinationExists'
  | 'WriteFailed';

export interface ConvertFailure {
  kind: ConvertFailureKind;
  path: string;
  message: string;
}

export type ConvertResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConvertFailure };

export function succeed<T>(value: T): ConvertResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ConvertFailureKind, path: string, message: string): ConvertResult<T> {
  return { ok: false, error: { kind, path, message } };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
