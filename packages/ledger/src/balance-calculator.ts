/**
 * @ledgerloop/ledger — Balance calculation engine.
 *
 * Two access patterns:
 * - Point balance through a date (one aggregate query)
 * - Day-by-day running balance over a visible range, seeded by the point
 *   balance through the day before the range and then accumulated with
 *   the per-day sums inside the range only
 *
 * Rules:
 * - All arithmetic is on integer minor units
 * - Every day of the range appears in the output, with or without entries
 */

import type { DailyBalance, DailyTotal, IsoDate } from "@ledgerloop/types";
import { FIRST_SUPPORTED_DATE } from "@ledgerloop/types";
import type { LedgerStore } from "./ledger-store.js";
import { eachDay, endOfMonth, previousDay, startOfMonth } from "./date-math.js";

/**
 * Accumulate per-day totals onto an opening balance, one output row per
 * day of [from, to]. Totals outside the range are ignored.
 */
export function accumulateDailyBalances(
  openingMinorUnits: number,
  totals: readonly DailyTotal[],
  from: IsoDate,
  to: IsoDate,
): DailyBalance[] {
  const byDate = new Map<IsoDate, number>();
  for (const total of totals) {
    byDate.set(total.date, (byDate.get(total.date) ?? 0) + total.totalMinorUnits);
  }

  let running = openingMinorUnits;
  return eachDay(from, to).map((date) => {
    const dayTotal = byDate.get(date) ?? 0;
    running += dayTotal;
    return { date, dayTotalMinorUnits: dayTotal, balanceMinorUnits: running };
  });
}

export class BalanceCalculator {
  private readonly _entries: LedgerStore;

  constructor(entries: LedgerStore) {
    this._entries = entries;
  }

  /**
   * Balance after every entry dated on or before `date`.
   */
  balanceThrough(date: IsoDate): number {
    return this._entries.runningBalanceThrough(date);
  }

  /**
   * Ending balance of each day in [from, to].
   */
  dailyBalances(from: IsoDate, to: IsoDate): DailyBalance[] {
    const totals = this._entries.dailyTotals(from, to);
    const opening = from === FIRST_SUPPORTED_DATE ? 0 : this._entries.runningBalanceThrough(previousDay(from));
    return accumulateDailyBalances(opening, totals, from, to);
  }

  /**
   * Ending balance of each day of a calendar month.
   */
  monthBalances(year: number, month: number): DailyBalance[] {
    return this.dailyBalances(startOfMonth(year, month), endOfMonth(year, month));
  }
}
