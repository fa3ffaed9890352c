/**
 * @ledgerloop/types — Shared domain types for the ledgerloop stack.
 *
 * These types are used across all ledgerloop packages:
 * - Entries and recurrence rules
 * - Daily totals and balances
 * - Typed results returned from the engine surface
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  IsoDate,
  EntryId,
  RuleId,
  RecurrenceUnit,
  Entry,
  Rule,
  DailyTotal,
  DailyBalance,
} from "./financial.js";

export { RECURRENCE_UNITS } from "./financial.js";

// Results
export type {
  FailureCode,
  Failure,
  Success,
  FailureResult,
  Result,
} from "./result.js";

export { ok, fail } from "./result.js";

// Calendar rules
export {
  MIN_YEAR,
  MAX_YEAR,
  FIRST_SUPPORTED_DATE,
  LAST_SUPPORTED_DATE,
  isLeapYear,
  monthLength,
  isSupportedYear,
} from "./calendar.js";

// Runtime type guards
export {
  isIsoDate,
  isRecurrenceUnit,
  isMinorUnits,
  isStoreId,
  isFailureCode,
  isEntry,
  isRule,
} from "./guards.js";
