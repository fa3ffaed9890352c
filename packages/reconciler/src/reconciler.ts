/**
 * Reconciler — Merges a manual entry into the rule created from it.
 *
 * Usage:
 *   const ruleId = db.rules.create(date, amount, note, 1, "month");
 *   reconciler.coalesceManualStart(ruleId);
 *   engine.generateUntil(ruleId, horizon);
 *
 * Run it before the rule's first expansion. Matching is exact on
 * (start date, amount, note); manual entries on other days are never
 * touched.
 */

import type { RuleId } from "@ledgerloop/types";
import type { LedgerDatabase } from "@ledgerloop/ledger";
import { assertStoreId } from "@ledgerloop/ledger";
import type { CoalesceOutcome } from "./types.js";

export class Reconciler {
  private readonly _db: LedgerDatabase;

  constructor(db: LedgerDatabase) {
    this._db = db;
  }

  /**
   * Fold the manual entry matching the rule's first occurrence into the
   * rule. If the rule already generated that occurrence, the manual entry
   * is removed; otherwise it is re-parented to the rule.
   *
   * The lookup and the change form one transaction.
   */
  coalesceManualStart(ruleId: RuleId): CoalesceOutcome {
    assertStoreId(ruleId, "rule");

    return this._db.atomically((): CoalesceOutcome => {
      const rule = this._db.rules.get(ruleId);
      if (rule === undefined) {
        return { kind: "rule-missing", ruleId };
      }

      const manual = this._db.entries.findManual(rule.startDate, rule.amountMinorUnits, rule.note);
      if (manual === undefined) {
        return { kind: "no-manual-entry", ruleId };
      }

      const generated = this._db.entries.findGenerated(
        rule.startDate,
        rule.amountMinorUnits,
        rule.note,
        rule.id,
      );
      if (generated !== undefined) {
        this._db.entries.delete(manual.id);
        return {
          kind: "removed-duplicate",
          ruleId,
          removedEntryId: manual.id,
          keptEntryId: generated.id,
        };
      }

      this._db.entries.attachToRule(manual.id, rule.id);
      return { kind: "reparented", ruleId, entryId: manual.id };
    });
  }
}
