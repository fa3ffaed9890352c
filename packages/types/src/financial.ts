/**
 * Financial Types
 *
 * Core value types for the budget ledger: single entries and the
 * recurrence rules that generate them.
 *
 * Rules:
 * - Amounts are integer minor units (cents), never floating point
 * - Dates are calendar dates in ISO form (YYYY-MM-DD), no time component
 * - A missing ruleId is the only thing that marks an entry as manual
 */

/**
 * A calendar date in ISO form, e.g. "2025-01-31".
 */
export type IsoDate = string;

/** Store-assigned entry identifier. */
export type EntryId = number;

/** Store-assigned rule identifier. */
export type RuleId = number;

/**
 * Interval unit of a recurrence rule.
 */
export type RecurrenceUnit = "day" | "week" | "month";

/** Every unit a rule may carry, in display order. */
export const RECURRENCE_UNITS: readonly RecurrenceUnit[] = ["day", "week", "month"] as const;

/**
 * A single ledger line, either entered by hand or generated by a rule.
 */
export interface Entry {
  readonly id: EntryId;

  readonly date: IsoDate;

  /** Signed amount in minor currency units. Negative = expense. */
  readonly amountMinorUnits: number;

  /** Free text. Empty string when the user left it blank. */
  readonly note: string;

  /** The rule that generated this entry. Absent for manual entries. */
  readonly ruleId?: RuleId | undefined;
}

/**
 * A recurrence template, e.g. "-50.00 rent every 1 month from 2025-01-01".
 */
export interface Rule {
  readonly id: RuleId;

  /** Date of the first occurrence */
  readonly startDate: IsoDate;

  readonly amountMinorUnits: number;

  readonly note: string;

  /** Interval count, always >= 1 */
  readonly everyN: number;

  readonly unit: RecurrenceUnit;

  /**
   * Date of the most recently materialized occurrence.
   * Absent until the rule has been expanded at least once.
   */
  readonly lastGeneratedDate?: IsoDate | undefined;
}

/**
 * Sum of all entry amounts on one day.
 */
export interface DailyTotal {
  readonly date: IsoDate;
  readonly totalMinorUnits: number;
}

/**
 * Ending balance of one day.
 */
export interface DailyBalance {
  readonly date: IsoDate;
  /** Sum of the day's own entries */
  readonly dayTotalMinorUnits: number;
  /** Balance after all entries on or before this date */
  readonly balanceMinorUnits: number;
}
