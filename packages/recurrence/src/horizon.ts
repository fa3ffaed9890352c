/**
 * @ledgerloop/recurrence — Expansion horizons.
 */

import type { IsoDate } from "@ledgerloop/types";
import { LAST_SUPPORTED_DATE, MAX_YEAR } from "@ledgerloop/types";
import { endOfMonth, shiftMonth } from "@ledgerloop/ledger";

export const DEFAULT_AHEAD_MONTHS = 12;

/**
 * Last day of the month `aheadMonths` after (year, month), capped at
 * the last supported date.
 *
 * horizonFor(2025, 3, 12) → "2026-03-31"
 * horizonFor(2025, 11, 3) → "2026-02-28"
 * horizonFor(9999, 6, 12) → "9999-12-31"
 */
export function horizonFor(
  year: number,
  month: number,
  aheadMonths: number = DEFAULT_AHEAD_MONTHS,
): IsoDate {
  const target = shiftMonth(year, month, aheadMonths);
  if (target.year > MAX_YEAR) {
    return LAST_SUPPORTED_DATE;
  }
  return endOfMonth(target.year, target.month);
}
