/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, rows read back from storage, imported data).
 */

import type { Entry, IsoDate, RecurrenceUnit, Rule } from "./financial.js";
import type { FailureCode } from "./result.js";
import { isSupportedYear, monthLength } from "./calendar.js";

// =============================================================================
// Date guards
// =============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date written as YYYY-MM-DD (years 0001-9999).
 * "2025-02-29" is rejected; "2024-02-29" is accepted.
 */
export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string") return false;
  const match = ISO_DATE.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isSupportedYear(year) || day < 1) return false;

  const limit = monthLength(year, month);
  return limit !== undefined && day <= limit;
}

// =============================================================================
// Financial guards
// =============================================================================

const UNITS = new Set<string>(["day", "week", "month"]);

const FAILURE_CODES = new Set<string>([
  "INVALID_DATE",
  "INVALID_AMOUNT",
  "INVALID_NOTE",
  "INVALID_UNIT",
  "NON_POSITIVE_INTERVAL",
  "INVALID_ID",
  "ENTRY_NOT_FOUND",
  "RULE_NOT_FOUND",
  "DUPLICATE_ENTRY",
  "STORAGE_FAILURE",
]);

export function isRecurrenceUnit(value: unknown): value is RecurrenceUnit {
  return typeof value === "string" && UNITS.has(value);
}

/** Integer minor units that survive a round trip through a JS number. */
export function isMinorUnits(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

/** Positive integer id, as assigned by the store. */
export function isStoreId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export function isFailureCode(value: unknown): value is FailureCode {
  return typeof value === "string" && FAILURE_CODES.has(value);
}

export function isEntry(value: unknown): value is Entry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isStoreId(v.id) &&
    isIsoDate(v.date) &&
    isMinorUnits(v.amountMinorUnits) &&
    typeof v.note === "string" &&
    (v.ruleId === undefined || isStoreId(v.ruleId))
  );
}

export function isRule(value: unknown): value is Rule {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isStoreId(v.id) &&
    isIsoDate(v.startDate) &&
    isMinorUnits(v.amountMinorUnits) &&
    typeof v.note === "string" &&
    isStoreId(v.everyN) &&
    isRecurrenceUnit(v.unit) &&
    (v.lastGeneratedDate === undefined || isIsoDate(v.lastGeneratedDate))
  );
}
