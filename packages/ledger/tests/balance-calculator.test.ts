/**
 * Tests for the balance calculator.
 *
 * Covers:
 * - Accumulating per-day totals onto an opening balance
 * - Opening balance from entries before the range
 * - Month views, including leap February
 * - Edge cases (empty ledger, single-day range)
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LedgerDatabase } from "../src/database.js";
import { BalanceCalculator, accumulateDailyBalances } from "../src/balance-calculator.js";

// ─── Pure Accumulation ───────────────────────────────────────────────────

describe("accumulateDailyBalances", () => {
  it("emits one row per day and carries the balance forward", () => {
    const rows = accumulateDailyBalances(
      100,
      [
        { date: "2025-01-02", totalMinorUnits: 50 },
        { date: "2025-01-04", totalMinorUnits: -30 },
      ],
      "2025-01-01",
      "2025-01-04",
    );

    expect(rows).toEqual([
      { date: "2025-01-01", dayTotalMinorUnits: 0, balanceMinorUnits: 100 },
      { date: "2025-01-02", dayTotalMinorUnits: 50, balanceMinorUnits: 150 },
      { date: "2025-01-03", dayTotalMinorUnits: 0, balanceMinorUnits: 150 },
      { date: "2025-01-04", dayTotalMinorUnits: -30, balanceMinorUnits: 120 },
    ]);
  });

  it("ignores totals outside the range", () => {
    const rows = accumulateDailyBalances(
      0,
      [{ date: "2025-02-01", totalMinorUnits: 999 }],
      "2025-01-30",
      "2025-01-31",
    );

    expect(rows.map((r) => r.balanceMinorUnits)).toEqual([0, 0]);
  });

  it("returns nothing for an inverted range", () => {
    expect(accumulateDailyBalances(5, [], "2025-01-02", "2025-01-01")).toEqual([]);
  });
});

// ─── Against the Store ───────────────────────────────────────────────────

describe("BalanceCalculator", () => {
  let db: LedgerDatabase;
  let calculator: BalanceCalculator;

  beforeEach(() => {
    db = LedgerDatabase.inMemory();
    calculator = new BalanceCalculator(db.entries);
  });

  afterEach(() => {
    db.close();
  });

  it("returns zero balances for an empty ledger", () => {
    const rows = calculator.dailyBalances("2025-01-01", "2025-01-03");
    expect(rows.map((r) => r.balanceMinorUnits)).toEqual([0, 0, 0]);
  });

  it("seeds the range with everything dated before it", () => {
    db.entries.insert("2024-12-31", 1000, "carried");
    db.entries.insert("2025-01-02", -200, "spend");

    const rows = calculator.dailyBalances("2025-01-01", "2025-01-02");

    expect(rows).toEqual([
      { date: "2025-01-01", dayTotalMinorUnits: 0, balanceMinorUnits: 1000 },
      { date: "2025-01-02", dayTotalMinorUnits: -200, balanceMinorUnits: 800 },
    ]);
  });

  it("starts from zero at the first representable day", () => {
    db.entries.insert("0001-01-01", 7, "first");

    const rows = calculator.dailyBalances("0001-01-01", "0001-01-02");
    expect(rows.map((r) => r.balanceMinorUnits)).toEqual([7, 7]);
  });

  it("handles a single-day range", () => {
    db.entries.insert("2025-03-10", 40, "a");
    db.entries.insert("2025-03-10", 2, "b");

    expect(calculator.dailyBalances("2025-03-10", "2025-03-10")).toEqual([
      { date: "2025-03-10", dayTotalMinorUnits: 42, balanceMinorUnits: 42 },
    ]);
  });

  it("covers every day of a month", () => {
    expect(calculator.monthBalances(2025, 2)).toHaveLength(28);
    expect(calculator.monthBalances(2024, 2)).toHaveLength(29);
    expect(calculator.monthBalances(2025, 12)).toHaveLength(31);
  });

  it("ends each month on the point balance for its last day", () => {
    db.entries.insert("2025-01-15", 500, "a");
    db.entries.insert("2025-02-10", -120, "b");
    db.entries.insert("2025-02-28", 30, "c");
    db.entries.insert("2025-03-01", 1, "next month");

    const rows = calculator.monthBalances(2025, 2);
    const last = rows[rows.length - 1];

    expect(last?.date).toBe("2025-02-28");
    expect(last?.balanceMinorUnits).toBe(410);
    expect(calculator.balanceThrough("2025-02-28")).toBe(410);
  });
});
