/**
 * Typed Results
 *
 * The outward-facing engine surface never throws. Each operation returns
 * either the value or a classified failure, and the caller decides how
 * to present it.
 */

/**
 * Failure classes an operation can report.
 *
 * - Validation: INVALID_DATE, INVALID_AMOUNT, INVALID_NOTE, INVALID_UNIT,
 *   NON_POSITIVE_INTERVAL, INVALID_ID
 * - Lookup: ENTRY_NOT_FOUND, RULE_NOT_FOUND
 * - Constraint: DUPLICATE_ENTRY (only from update; insert resolves conflicts)
 * - Storage: STORAGE_FAILURE
 */
export type FailureCode =
  | "INVALID_DATE"
  | "INVALID_AMOUNT"
  | "INVALID_NOTE"
  | "INVALID_UNIT"
  | "NON_POSITIVE_INTERVAL"
  | "INVALID_ID"
  | "ENTRY_NOT_FOUND"
  | "RULE_NOT_FOUND"
  | "DUPLICATE_ENTRY"
  | "STORAGE_FAILURE";

export interface Failure {
  readonly code: FailureCode;
  readonly message: string;
}

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface FailureResult {
  readonly ok: false;
  readonly error: Failure;
}

export type Result<T> = Success<T> | FailureResult;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(code: FailureCode, message: string): FailureResult {
  return { ok: false, error: { code, message } };
}
