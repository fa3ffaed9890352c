/**
 * @ledgerloop/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @ledgerloop/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws before anything is written
 */

import type { FailureCode, IsoDate } from "@ledgerloop/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. Same set the typed results carry. */
export type LedgerErrorCode = FailureCode;

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Storage Options ─────────────────────────────────────────────────────

/**
 * Options for opening a ledger database.
 */
export interface LedgerDatabaseOptions {
  /** Path to the SQLite file, or ":memory:" for a throwaway database */
  readonly filePath: string;
  /** How long a write waits on a locked database, in milliseconds. Default 3000. */
  readonly busyTimeoutMs?: number | undefined;
}

// ─── Operation Results ───────────────────────────────────────────────────

/**
 * Outcome of deleting a rule together with its generated entries.
 */
export interface RuleDeletion {
  readonly ruleDeleted: boolean;
  readonly entriesDeleted: number;
}

// ─── Row Types ───────────────────────────────────────────────────────────

/** Raw `entries` row as SQLite returns it. */
export interface EntryRow {
  readonly id: number;
  readonly date: IsoDate;
  readonly amount_minor_units: number;
  readonly note: string;
  readonly rule_id: number | null;
}

/** Raw `rules` row as SQLite returns it. */
export interface RuleRow {
  readonly id: number;
  readonly start_date: IsoDate;
  readonly amount_minor_units: number;
  readonly note: string;
  readonly every_n: number;
  readonly unit: string;
  readonly last_generated_date: IsoDate | null;
}

/** Raw `day_totals` row as SQLite returns it. */
export interface DayTotalRow {
  readonly date: IsoDate;
  readonly total_minor_units: number;
}
