/**
 * Tests for Reconciler.coalesceManualStart.
 *
 * Covers:
 * - Each outcome kind
 * - Exact matching on (start date, amount, note)
 * - Interaction with the first expansion
 * - Determinism: a second run changes nothing
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LedgerDatabase } from "@ledgerloop/ledger";
import { RecurrenceEngine } from "@ledgerloop/recurrence";
import { Reconciler } from "../src/reconciler.js";

let db: LedgerDatabase;
let reconciler: Reconciler;

beforeEach(() => {
  db = LedgerDatabase.inMemory();
  reconciler = new Reconciler(db);
});

afterEach(() => {
  db.close();
});

describe("coalesceManualStart", () => {
  it("reports a missing rule", () => {
    expect(reconciler.coalesceManualStart(12)).toEqual({ kind: "rule-missing", ruleId: 12 });
  });

  it("reports when there is no matching manual entry", () => {
    const ruleId = db.rules.create("2025-01-01", -5000, "rent", 1, "month");
    db.entries.insert("2025-01-01", -5000, "Rent");
    db.entries.insert("2025-01-02", -5000, "rent");
    db.entries.insert("2025-01-01", -4999, "rent");

    expect(reconciler.coalesceManualStart(ruleId)).toEqual({ kind: "no-manual-entry", ruleId });
    expect(db.entries.countByRule(ruleId)).toBe(0);
  });

  it("re-parents the manual entry to the rule", () => {
    const manual = db.entries.insert("2025-01-01", -5000, "rent");
    const ruleId = db.rules.create("2025-01-01", -5000, "rent", 1, "month");

    expect(reconciler.coalesceManualStart(ruleId)).toEqual({
      kind: "reparented",
      ruleId,
      entryId: manual,
    });
    expect(db.entries.get(manual)?.ruleId).toBe(ruleId);
  });

  it("removes the manual entry when the rule already generated its twin", () => {
    const manual = db.entries.insert("2025-01-01", -5000, "rent");
    const ruleId = db.rules.create("2025-01-01", -5000, "rent", 1, "month");
    const generated = db.entries.insert("2025-01-01", -5000, "rent", ruleId);

    expect(reconciler.coalesceManualStart(ruleId)).toEqual({
      kind: "removed-duplicate",
      ruleId,
      removedEntryId: manual,
      keptEntryId: generated,
    });
    expect(db.entries.get(manual)).toBeUndefined();
    expect(db.entries.count()).toBe(1);
  });

  it("leaves exactly one first occurrence after expansion", () => {
    const manual = db.entries.insert("2025-01-01", -5000, "rent");
    const ruleId = db.rules.create("2025-01-01", -5000, "rent", 1, "month");

    reconciler.coalesceManualStart(ruleId);
    const result = new RecurrenceEngine(db).generateUntil(ruleId, "2025-03-31");

    expect(result.entryIds[0]).toBe(manual);
    expect(db.entries.listByDate("2025-01-01")).toHaveLength(1);
    expect(db.entries.countByRule(ruleId)).toBe(3);
    expect(db.entries.runningBalanceThrough("2025-03-31")).toBe(-15000);
  });

  it("changes nothing when run a second time", () => {
    db.entries.insert("2025-01-01", -5000, "rent");
    const ruleId = db.rules.create("2025-01-01", -5000, "rent", 1, "month");

    reconciler.coalesceManualStart(ruleId);
    const before = db.entries.listBetween("2025-01-01", "2025-12-31");

    expect(reconciler.coalesceManualStart(ruleId)).toEqual({ kind: "no-manual-entry", ruleId });
    expect(db.entries.listBetween("2025-01-01", "2025-12-31")).toEqual(before);
  });

  it("adopts a manual entry for one rule only", () => {
    const ruleId = db.rules.create("2025-01-01", -5000, "rent", 1, "week");
    const other = db.rules.create("2025-01-01", -5000, "rent", 1, "month");
    const manual = db.entries.insert("2025-01-01", -5000, "rent");

    expect(reconciler.coalesceManualStart(ruleId)).toEqual({
      kind: "reparented",
      ruleId,
      entryId: manual,
    });
    expect(reconciler.coalesceManualStart(other)).toEqual({
      kind: "no-manual-entry",
      ruleId: other,
    });
  });
});
