/**
 * @ledgerloop/ledger — Atomic units of work.
 */

import type BetterSqlite3 from "better-sqlite3";
import { LedgerError } from "./types.js";

/**
 * Pass LedgerErrors through; classify anything else as STORAGE_FAILURE.
 */
export function toLedgerError(error: unknown): LedgerError {
  if (error instanceof LedgerError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LedgerError("STORAGE_FAILURE", `Storage failure: ${message}`, { cause: error });
}

/**
 * Run `fn` inside one SQLite transaction. Any throw rolls the whole unit
 * back and surfaces as a LedgerError. Nested calls become savepoints.
 */
export function runAtomic<T>(db: BetterSqlite3.Database, fn: () => T): T {
  try {
    return db.transaction(fn)();
  } catch (error) {
    throw toLedgerError(error);
  }
}

/**
 * True when SQLite rejected a write because of a UNIQUE index.
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
}
