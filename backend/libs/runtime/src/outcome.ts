// runtime/src/outcome.ts
// Engine results as an explicit sum type.
// "unavailable" is a real, analyzable state of the data (empty input, constant
// column); "invalid" carries a ValidationError the caller can correct.

import type { ValidationError } from "./errors";

export type Ok<T> = { status: "ok"; value: T };

export type UnavailableReason = "no_rows" | "no_values" | "constant_column";

export type Unavailable = { status: "unavailable"; reason: UnavailableReason };

export type Invalid = { status: "invalid"; error: ValidationError };

/** Result of an operation that can only fail validation. */
export type Checked<T> = Ok<T> | Invalid;

/** Result of an operation over data that may be degenerate. */
export type Maybe<T> = Ok<T> | Unavailable;

export type Outcome<T> = Ok<T> | Unavailable | Invalid;

export const ok = <T>(value: T): Ok<T> => ({ status: "ok", value });

export const unavailable = (reason: UnavailableReason): Unavailable => ({ status: "unavailable", reason });

export const invalid = (error: ValidationError): Invalid => ({ status: "invalid", error });

export function isOk<T>(r: Outcome<T>): r is Ok<T> {
  return r.status === "ok";
}
