/**
 * Property-Based Tests for @ledgerloop/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Day arithmetic is invertible
 * 2. Month arithmetic always lands on a real date
 * 3. Insert is idempotent per dedup key
 * 4. Point balance equals the sum of entries on or before the date
 * 5. Daily balances agree with point balances
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { isIsoDate } from "@ledgerloop/types";
import { LedgerDatabase } from "../src/database.js";
import { BalanceCalculator } from "../src/balance-calculator.js";
import {
  addDays,
  addMonths,
  daysBetween,
  daysInMonth,
  formatIsoDate,
  parseIsoDate,
} from "../src/date-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Generate a real calendar date between 1900 and 2100. */
const arbDate = fc
  .record({
    year: fc.integer({ min: 1900, max: 2100 }),
    month: fc.integer({ min: 1, max: 12 }),
    dayIndex: fc.integer({ min: 0, max: 30 }),
  })
  .map(({ year, month, dayIndex }) =>
    formatIsoDate({ year, month, day: (dayIndex % daysInMonth(year, month)) + 1 }),
  );

/** Generate a date within January and February 2025. */
const arbNearDate = fc
  .integer({ min: 0, max: 58 })
  .map((offset) => addDays("2025-01-01", offset));

const arbAmount = fc.integer({ min: -100_000, max: 100_000 });

const arbEntry = fc.record({
  date: arbNearDate,
  amount: arbAmount,
  note: fc.constantFrom("", "rent", "coffee", "pay"),
});

// =============================================================================
// Property: Date Arithmetic
// =============================================================================

describe("property: date arithmetic", () => {
  it("addDays(d, n) then addDays(-n) returns d", () => {
    fc.assert(
      fc.property(arbDate, fc.integer({ min: -5000, max: 5000 }), (date, n) => {
        expect(addDays(addDays(date, n), -n)).toBe(date);
      }),
      { numRuns: 300 },
    );
  });

  it("daysBetween inverts addDays", () => {
    fc.assert(
      fc.property(arbDate, fc.integer({ min: -5000, max: 5000 }), (date, n) => {
        expect(daysBetween(date, addDays(date, n))).toBe(n);
      }),
      { numRuns: 300 },
    );
  });

  it("addMonths always produces a valid date no later than the source day", () => {
    fc.assert(
      fc.property(arbDate, fc.integer({ min: -24, max: 24 }), (date, n) => {
        const shifted = addMonths(date, n);
        expect(isIsoDate(shifted)).toBe(true);
        expect(parseIsoDate(shifted).day).toBeLessThanOrEqual(parseIsoDate(date).day);
      }),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Store Invariants
// =============================================================================

describe("property: idempotent insert", () => {
  it("re-inserting any batch leaves the ledger unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbEntry, { minLength: 1, maxLength: 20 }), (batch) => {
        const db = LedgerDatabase.inMemory();
        try {
          const firstIds = batch.map((e) => db.entries.insert(e.date, e.amount, e.note));
          const count = db.entries.count();
          const secondIds = batch.map((e) => db.entries.insert(e.date, e.amount, e.note));

          expect(secondIds).toEqual(firstIds);
          expect(db.entries.count()).toBe(count);
          expect(count).toBe(new Set(firstIds).size);
        } finally {
          db.close();
        }
      }),
      { numRuns: 100 },
    );
  });
});

describe("property: balances", () => {
  it("point balance equals the sum of stored entries through the date", () => {
    fc.assert(
      fc.property(
        fc.array(arbEntry, { minLength: 0, maxLength: 25 }),
        arbNearDate,
        (batch, through) => {
          const db = LedgerDatabase.inMemory();
          try {
            for (const e of batch) {
              db.entries.insert(e.date, e.amount, e.note);
            }
            const expected = db.entries
              .listBetween("2025-01-01", through)
              .reduce((sum, e) => sum + e.amountMinorUnits, 0);

            expect(db.entries.runningBalanceThrough(through)).toBe(expected);
          } finally {
            db.close();
          }
        },
      ),
      { numRuns: 100 },
    );
  });

  it("every daily balance matches the point balance for that day", () => {
    fc.assert(
      fc.property(fc.array(arbEntry, { minLength: 0, maxLength: 25 }), (batch) => {
        const db = LedgerDatabase.inMemory();
        try {
          for (const e of batch) {
            db.entries.insert(e.date, e.amount, e.note);
          }
          const calculator = new BalanceCalculator(db.entries);

          for (const row of calculator.dailyBalances("2025-01-10", "2025-02-05")) {
            expect(row.balanceMinorUnits).toBe(calculator.balanceThrough(row.date));
          }
        } finally {
          db.close();
        }
      }),
      { numRuns: 50 },
    );
  });

  it("balances never decrease when every amount is non-negative", () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.record({ date: arbNearDate, amount: fc.integer({ min: 0, max: 10_000 }) }),
          { maxLength: 20 },
        ),
        (batch) => {
          const db = LedgerDatabase.inMemory();
          try {
            batch.forEach((e, i) => db.entries.insert(e.date, e.amount, `n${i}`));
            const rows = new BalanceCalculator(db.entries).monthBalances(2025, 1);

            for (let i = 1; i < rows.length; i++) {
              const prev = rows[i - 1]?.balanceMinorUnits ?? 0;
              expect(rows[i]?.balanceMinorUnits).toBeGreaterThanOrEqual(prev);
            }
          } finally {
            db.close();
          }
        },
      ),
      { numRuns: 50 },
    );
  });
});
