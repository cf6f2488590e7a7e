/**
 * Option errors: the closed set of ways an instrument call can fail.
 *
 * Mutating operations never throw for a domain failure; they return an
 * OptionResult whose `error.kind` is one of OPTION_ERROR_KINDS.
 */

export const OPTION_ERROR_KINDS = [
  "Unauthorized",
  "AlreadyExpired",
  "NotYetExpirable",
  "NotInExerciseWindow",
  "InsufficientUnitBalance",
  "InsufficientPayment",
  "AmountMismatch",
  "ZeroAmount",
  "Unsupported",
  "TransferFailed",
  "ReentrantCall",
  "InvalidParameters",
] as const;

export type OptionErrorKind = (typeof OPTION_ERROR_KINDS)[number];

export interface OptionError {
  readonly kind: OptionErrorKind;
  readonly message: string;
}

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly error: OptionError;
}

export type OptionResult<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(kind: OptionErrorKind, message: string): Failure {
  return { ok: false, error: { kind, message } };
}

/**
 * Thrown by `unwrap` for callers that prefer exceptions.
 */
export class OptionFailure extends Error {
  public readonly kind: OptionErrorKind;

  constructor(error: OptionError) {
    super(error.message);
    this.name = "OptionFailure";
    this.kind = error.kind;
  }
}

/**
 * Return the value of a successful result, or throw OptionFailure.
 */
export function unwrap<T>(result: OptionResult<T>): T {
  if (!result.ok) {
    throw new OptionFailure(result.error);
  }
  return result.value;
}
