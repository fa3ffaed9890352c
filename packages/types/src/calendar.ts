/**
 * Calendar rules shared by the guards and the ledger's date arithmetic.
 */

import type { IsoDate } from "./financial.js";

/** Dates stay within four-digit years so they sort correctly as text. */
export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

export const FIRST_SUPPORTED_DATE: IsoDate = "0001-01-01";
export const LAST_SUPPORTED_DATE: IsoDate = "9999-12-31";

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/**
 * Proleptic Gregorian leap rule: divisible by 4, not by 100 unless also by 400.
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Days in the given month, or undefined when `month` is not 1-12.
 */
export function monthLength(year: number, month: number): number | undefined {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return MONTH_LENGTHS[month - 1];
}

export function isSupportedYear(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_YEAR && year <= MAX_YEAR;
}
