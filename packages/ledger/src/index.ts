/**
 * @ledgerloop/ledger — Durable ledger storage and balances.
 *
 * A SQLite-backed store for budget entries and recurrence rules.
 * Enforces the ledger invariants in storage itself:
 * - At most one entry per (date, amount, note, rule) tuple
 * - Deleting a rule deletes the entries it generated
 * - Rule units are limited to day, week and month
 * - Per-day totals are maintained by triggers for fast balances
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws LedgerError before any write
 * - Synchronous API; multi-step mutations are single transactions
 */

// Database handle
export { LedgerDatabase } from "./database.js";
export { runAtomic, toLedgerError, isUniqueViolation } from "./atomic.js";

// Stores
export { LedgerStore, toEntry } from "./ledger-store.js";
export { RuleStore, toRule } from "./rule-store.js";

// Schema
export { MIGRATIONS, SCHEMA_VERSION, migrate, readSchemaVersion } from "./schema.js";
export type { Migration } from "./schema.js";

// Balance computation
export { BalanceCalculator, accumulateDailyBalances } from "./balance-calculator.js";

// Calendar arithmetic
export {
  isLeapYear,
  daysInMonth,
  assertIsoDate,
  parseIsoDate,
  formatIsoDate,
  addDays,
  addMonths,
  shiftMonth,
  previousDay,
  startOfMonth,
  endOfMonth,
  daysBetween,
  eachDay,
} from "./date-math.js";
export type { CalendarDate } from "./date-math.js";

// Validation
export {
  assertMinorUnits,
  assertNote,
  assertStoreId,
  assertUnit,
  assertInterval,
} from "./validation.js";

// Types
export type {
  LedgerErrorCode,
  LedgerDatabaseOptions,
  RuleDeletion,
  EntryRow,
  RuleRow,
  DayTotalRow,
} from "./types.js";

export { LedgerError } from "./types.js";
