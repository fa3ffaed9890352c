/**
 * @ledgerloop/ledger — Deterministic calendar arithmetic.
 *
 * Dates are handled as proleptic Gregorian day numbers (days since
 * 1970-01-01), never through Date objects, so no time zone or DST rule
 * can shift a calendar day.
 *
 * Rules:
 * - Input and output are ISO calendar dates (YYYY-MM-DD)
 * - Years are limited to 0001-9999
 * - Month arithmetic clamps the day to the end of the target month
 */

import type { IsoDate } from "@ledgerloop/types";
import { isIsoDate, isLeapYear, isSupportedYear, monthLength } from "@ledgerloop/types";
import { LedgerError } from "./types.js";

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Days since 1970-01-01 for a civil date.
 *
 * 1970-01-01 → 0
 * 2000-03-01 → 11017
 */
function daysFromCivil(date: CalendarDate): number {
  const y = date.month <= 2 ? date.year - 1 : date.year;
  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400;
  const shiftedMonth = (date.month + 9) % 12;
  const dayOfYear = Math.floor((153 * shiftedMonth + 2) / 5) + date.day - 1;
  const dayOfEra =
    yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
  return era * 146097 + dayOfEra - 719468;
}

/**
 * Inverse of daysFromCivil.
 */
function civilFromDays(dayNumber: number): CalendarDate {
  const z = dayNumber + 719468;
  const era = Math.floor(z / 146097);
  const dayOfEra = z - era * 146097;
  const yearOfEra = Math.floor(
    (dayOfEra -
      Math.floor(dayOfEra / 1460) +
      Math.floor(dayOfEra / 36524) -
      Math.floor(dayOfEra / 146096)) /
      365,
  );
  const dayOfYear =
    dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100));
  const shiftedMonth = Math.floor((5 * dayOfYear + 2) / 153);
  const day = dayOfYear - Math.floor((153 * shiftedMonth + 2) / 5) + 1;
  const month = shiftedMonth < 10 ? shiftedMonth + 3 : shiftedMonth - 9;
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

// ─── Public API ──────────────────────────────────────────────────────────

export { isLeapYear };

export function daysInMonth(year: number, month: number): number {
  const length = monthLength(year, month);
  if (length === undefined) {
    throw new LedgerError("INVALID_DATE", `Invalid month: ${String(month)}`);
  }
  return length;
}

/**
 * Throw unless the value is a real calendar date in ISO form.
 */
export function assertIsoDate(value: unknown, label = "date"): asserts value is IsoDate {
  if (!isIsoDate(value)) {
    throw new LedgerError("INVALID_DATE", `Invalid ${label}: "${String(value)}" (expected YYYY-MM-DD)`);
  }
}

export function parseIsoDate(value: IsoDate): CalendarDate {
  assertIsoDate(value);
  return {
    year: Number(value.slice(0, 4)),
    month: Number(value.slice(5, 7)),
    day: Number(value.slice(8, 10)),
  };
}

export function formatIsoDate(date: CalendarDate): IsoDate {
  if (!isSupportedYear(date.year)) {
    throw new LedgerError(
      "INVALID_DATE",
      `Date out of supported range: year ${String(date.year)}`,
    );
  }
  const yyyy = String(date.year).padStart(4, "0");
  const mm = String(date.month).padStart(2, "0");
  const dd = String(date.day).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

/**
 * Add (or subtract) whole days.
 *
 * addDays("2024-02-28", 1) → "2024-02-29"
 * addDays("2025-03-01", -1) → "2025-02-28"
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  return formatIsoDate(civilFromDays(daysFromCivil(parseIsoDate(date)) + days));
}

/**
 * Add whole months, clamping the day to the last valid day of the
 * resulting month.
 *
 * addMonths("2025-01-31", 1) → "2025-02-28"
 * addMonths("2024-01-31", 1) → "2024-02-29"
 * addMonths("2025-11-15", 3) → "2026-02-15"
 */
export function addMonths(date: IsoDate, months: number): IsoDate {
  const { year, month, day } = parseIsoDate(date);
  const target = shiftMonth(year, month, months);
  return formatIsoDate({
    year: target.year,
    month: target.month,
    day: Math.min(day, daysInMonth(target.year, target.month)),
  });
}

/**
 * Shift a (year, month) pair by a number of months.
 */
export function shiftMonth(
  year: number,
  month: number,
  months: number,
): { readonly year: number; readonly month: number } {
  const index = year * 12 + (month - 1) + months;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

export function previousDay(date: IsoDate): IsoDate {
  return addDays(date, -1);
}

export function startOfMonth(year: number, month: number): IsoDate {
  return formatIsoDate({ year, month, day: 1 });
}

export function endOfMonth(year: number, month: number): IsoDate {
  return formatIsoDate({ year, month, day: daysInMonth(year, month) });
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return daysFromCivil(parseIsoDate(to)) - daysFromCivil(parseIsoDate(from));
}

/**
 * Every date in [from, to], ascending. Empty when from > to.
 */
export function eachDay(from: IsoDate, to: IsoDate): IsoDate[] {
  const start = daysFromCivil(parseIsoDate(from));
  const end = daysFromCivil(parseIsoDate(to));
  const days: IsoDate[] = [];
  for (let n = start; n <= end; n++) {
    days.push(formatIsoDate(civilFromDays(n)));
  }
  return days;
}
