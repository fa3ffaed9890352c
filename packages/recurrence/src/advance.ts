/**
 * @ledgerloop/recurrence — Occurrence stepping.
 */

import type { IsoDate, RecurrenceUnit } from "@ledgerloop/types";
import { LAST_SUPPORTED_DATE, isSupportedYear } from "@ledgerloop/types";
import {
  addDays,
  addMonths,
  assertInterval,
  assertUnit,
  daysBetween,
  parseIsoDate,
  shiftMonth,
} from "@ledgerloop/ledger";

/**
 * The occurrence after `date` for a rule repeating every `everyN` units,
 * or undefined once the series would step past 9999-12-31.
 *
 * advance("2025-01-01", 2, "week")  → "2025-01-15"
 * advance("2025-01-31", 1, "month") → "2025-02-28"
 * advance("9999-12-27", 1, "week")  → undefined
 *
 * Month steps clamp to the last day of the target month and always
 * start from the given occurrence, so a series begun on the 31st
 * continues on the 28th once it has passed February.
 */
export function advance(
  date: IsoDate,
  everyN: number,
  unit: RecurrenceUnit,
): IsoDate | undefined {
  assertUnit(unit);
  assertInterval(everyN);
  switch (unit) {
    case "day":
      return stepDays(date, everyN);
    case "week":
      return stepDays(date, 7 * everyN);
    case "month": {
      const { year, month } = parseIsoDate(date);
      return isSupportedYear(shiftMonth(year, month, everyN).year)
        ? addMonths(date, everyN)
        : undefined;
    }
  }
}

function stepDays(date: IsoDate, days: number): IsoDate | undefined {
  return daysBetween(date, LAST_SUPPORTED_DATE) >= days ? addDays(date, days) : undefined;
}
