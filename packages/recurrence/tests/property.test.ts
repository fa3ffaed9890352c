/**
 * Property-Based Tests for @ledgerloop/recurrence
 *
 * 1. Expansion is idempotent: running twice adds nothing
 * 2. Expansion in steps equals expansion in one run
 * 3. Occurrences are strictly increasing and within [start, horizon]
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { LedgerDatabase, addDays } from "@ledgerloop/ledger";
import { RECURRENCE_UNITS } from "@ledgerloop/types";
import { RecurrenceEngine } from "../src/recurrence-engine.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbRuleShape = fc.record({
  startOffset: fc.integer({ min: 0, max: 365 }),
  everyN: fc.integer({ min: 1, max: 6 }),
  unit: fc.constantFrom(...RECURRENCE_UNITS),
  amount: fc.integer({ min: -50_000, max: 50_000 }),
});

const arbHorizonOffset = fc.integer({ min: 0, max: 730 });

function expand(
  shape: { startOffset: number; everyN: number; unit: string; amount: number },
  horizons: readonly string[],
): string[] {
  const db = LedgerDatabase.inMemory();
  try {
    const engine = new RecurrenceEngine(db);
    const ruleId = db.rules.create(
      addDays("2024-01-01", shape.startOffset),
      shape.amount,
      "rule",
      shape.everyN,
      shape.unit,
    );
    for (const horizon of horizons) {
      engine.generateUntil(ruleId, horizon);
    }
    return db.entries.listBetween("0001-01-01", "9999-12-31").map((e) => e.date);
  } finally {
    db.close();
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("property: generation", () => {
  it("a repeated run adds nothing", () => {
    fc.assert(
      fc.property(arbRuleShape, arbHorizonOffset, (shape, h) => {
        const horizon = addDays("2024-01-01", h);
        expect(expand(shape, [horizon, horizon])).toEqual(expand(shape, [horizon]));
      }),
      { numRuns: 60 },
    );
  });

  it("stepwise expansion matches a single run", () => {
    fc.assert(
      fc.property(arbRuleShape, arbHorizonOffset, arbHorizonOffset, (shape, a, b) => {
        const near = addDays("2024-01-01", Math.min(a, b));
        const far = addDays("2024-01-01", Math.max(a, b));
        expect(expand(shape, [near, far])).toEqual(expand(shape, [far]));
      }),
      { numRuns: 60 },
    );
  });

  it("occurrences are strictly increasing and bounded", () => {
    fc.assert(
      fc.property(arbRuleShape, arbHorizonOffset, (shape, h) => {
        const start = addDays("2024-01-01", shape.startOffset);
        const horizon = addDays("2024-01-01", h);
        const dates = expand(shape, [horizon]);

        for (let i = 0; i < dates.length; i++) {
          const date = dates[i] ?? "";
          expect(date >= start && date <= horizon).toBe(true);
          if (i > 0) {
            expect(date > (dates[i - 1] ?? "")).toBe(true);
          }
        }
        expect(dates.length > 0).toBe(start <= horizon);
      }),
      { numRuns: 60 },
    );
  });
});
