/**
 * @ledgerloop/ledger — Input validation at the storage boundary.
 *
 * Everything here throws a LedgerError before any write happens, so a
 * rejected call never leaves partial state behind.
 */

import type { RecurrenceUnit } from "@ledgerloop/types";
import { isMinorUnits, isRecurrenceUnit, isStoreId } from "@ledgerloop/types";
import { LedgerError } from "./types.js";

export function assertMinorUnits(value: unknown): asserts value is number {
  if (!isMinorUnits(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount must be an integer number of minor units, got: ${String(value)}`,
    );
  }
}

export function assertNote(value: unknown): asserts value is string {
  if (typeof value !== "string") {
    throw new LedgerError("INVALID_NOTE", `Note must be a string, got: ${typeof value}`);
  }
}

export function assertStoreId(value: unknown, kind: "entry" | "rule"): asserts value is number {
  if (!isStoreId(value)) {
    throw new LedgerError("INVALID_ID", `Invalid ${kind} id: ${String(value)}`);
  }
}

export function assertUnit(value: unknown): asserts value is RecurrenceUnit {
  if (!isRecurrenceUnit(value)) {
    throw new LedgerError(
      "INVALID_UNIT",
      `Invalid unit: "${String(value)}". Must be: day, week, or month`,
    );
  }
}

export function assertInterval(value: unknown): asserts value is number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 1) {
    throw new LedgerError(
      "NON_POSITIVE_INTERVAL",
      `Interval must be a positive integer, got: ${String(value)}`,
    );
  }
}
