export const DecodeErrorCode = {
  TruncatedInput: "TruncatedInput",
  TagMismatch: "TagMismatch",
  MalformedLength: "MalformedLength",
  LengthOutOfBounds: "LengthOutOfBounds",
  UnusableCursor: "UnusableCursor",
} as const;
export type DecodeErrorCode =
  (typeof DecodeErrorCode)[keyof typeof DecodeErrorCode];

export interface DecodeFailure {
  code: DecodeErrorCode;
  /** Absolute offset at which the failing read started. */
  offset: number;
  detail: string;
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: DecodeFailure };

export function fail<T>(
  code: DecodeErrorCode,
  offset: number,
  detail: string,
): DecodeResult<T> {
  return { ok: false, failure: { code, offset, detail } };
}

export class BerDecodeError extends Error {
  public readonly code: DecodeErrorCode;
  public readonly offset: number;

  public constructor(operation: string, failure: DecodeFailure) {
    super(`${operation} failed at offset ${failure.offset}: ${failure.detail}`);
    this.name = "BerDecodeError";
    this.code = failure.code;
    this.offset = failure.offset;
  }
}
