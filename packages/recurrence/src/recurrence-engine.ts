/**
 * RecurrenceEngine — Expands rules into dated entries.
 *
 * Usage:
 *   const engine = new RecurrenceEngine(db);
 *   const result = engine.generateUntil(ruleId, "2025-12-31");
 *
 * Rules:
 * - Expansion resumes after the rule's cursor, or at its start date
 * - Every occurrence goes through LedgerStore.insert, so re-running is
 *   idempotent
 * - The cursor records the last produced occurrence and only moves forward
 * - A series ends at 9999-12-31
 * - One rule's expansion is a single transaction
 */

import type { EntryId, IsoDate, RuleId } from "@ledgerloop/types";
import type { LedgerDatabase } from "@ledgerloop/ledger";
import { assertIsoDate, assertStoreId } from "@ledgerloop/ledger";
import { advance } from "./advance.js";
import type { GenerationResult } from "./types.js";

export class RecurrenceEngine {
  private readonly _db: LedgerDatabase;

  constructor(db: LedgerDatabase) {
    this._db = db;
  }

  /**
   * Insert every occurrence of the rule dated on or before `horizon`
   * that lies past the cursor.
   *
   * A missing rule, or a horizon before the next occurrence, produces
   * nothing and leaves the cursor alone.
   */
  generateUntil(ruleId: RuleId, horizon: IsoDate): GenerationResult {
    assertStoreId(ruleId, "rule");
    assertIsoDate(horizon, "horizon");

    return this._db.atomically(() => {
      const rule = this._db.rules.get(ruleId);
      if (rule === undefined) {
        return { ruleId, produced: 0, entryIds: [] };
      }

      const entryIds: EntryId[] = [];
      let last: IsoDate | undefined;
      let next: IsoDate | undefined =
        rule.lastGeneratedDate === undefined
          ? rule.startDate
          : advance(rule.lastGeneratedDate, rule.everyN, rule.unit);

      while (next !== undefined && next <= horizon) {
        entryIds.push(this._db.entries.insert(next, rule.amountMinorUnits, rule.note, rule.id));
        last = next;
        next = next === horizon ? undefined : advance(next, rule.everyN, rule.unit);
      }

      if (last !== undefined) {
        this._db.rules.advanceCursor(rule.id, last);
      }

      return {
        ruleId,
        produced: entryIds.length,
        entryIds,
        cursor: last ?? rule.lastGeneratedDate,
      };
    });
  }

  /**
   * Expand every rule up to `horizon`, oldest rule first.
   */
  generateAllUntil(horizon: IsoDate): GenerationResult[] {
    assertIsoDate(horizon, "horizon");
    return this._db.atomically(() =>
      this._db.rules.list().map((rule) => this.generateUntil(rule.id, horizon)),
    );
  }
}
