/**
 * @ledgerloop/ledger — Rule Store.
 *
 * Persists recurrence rules. A rule is written once, afterwards only its
 * expansion cursor moves, and it is deleted together with every entry it
 * generated.
 *
 * Rules:
 * - unit is validated before the write (and by a CHECK constraint)
 * - the cursor never moves backwards
 * - deletion of a rule and its entries is one atomic unit
 */

import type BetterSqlite3 from "better-sqlite3";
import type { IsoDate, RecurrenceUnit, Rule, RuleId } from "@ledgerloop/types";
import { isRecurrenceUnit } from "@ledgerloop/types";
import { runAtomic } from "./atomic.js";
import { assertIsoDate } from "./date-math.js";
import type { RuleDeletion, RuleRow } from "./types.js";
import { LedgerError } from "./types.js";
import {
  assertInterval,
  assertMinorUnits,
  assertNote,
  assertStoreId,
  assertUnit,
} from "./validation.js";

const RULE_COLUMNS =
  "id, start_date, amount_minor_units, note, every_n, unit, last_generated_date";

/**
 * Map a storage row to the Rule value type.
 * Throws STORAGE_FAILURE for a unit this build does not know.
 */
export function toRule(row: RuleRow): Rule {
  if (!isRecurrenceUnit(row.unit)) {
    throw new LedgerError(
      "STORAGE_FAILURE",
      `Rule ${String(row.id)} has an unknown unit in storage: "${row.unit}"`,
    );
  }
  const rule: Rule = {
    id: row.id,
    startDate: row.start_date,
    amountMinorUnits: row.amount_minor_units,
    note: row.note,
    everyN: row.every_n,
    unit: row.unit,
  };
  return row.last_generated_date === null
    ? rule
    : { ...rule, lastGeneratedDate: row.last_generated_date };
}

export class RuleStore {
  private readonly _db: BetterSqlite3.Database;

  private readonly _insert: BetterSqlite3.Statement<
    [IsoDate, number, string, number, RecurrenceUnit]
  >;
  private readonly _get: BetterSqlite3.Statement<[RuleId], RuleRow>;
  private readonly _list: BetterSqlite3.Statement<[], RuleRow>;
  private readonly _advance: BetterSqlite3.Statement<[IsoDate, RuleId, IsoDate]>;
  private readonly _deleteEntries: BetterSqlite3.Statement<[RuleId]>;
  private readonly _deleteRule: BetterSqlite3.Statement<[RuleId]>;

  constructor(db: BetterSqlite3.Database) {
    this._db = db;

    this._insert = db.prepare<[IsoDate, number, string, number, RecurrenceUnit]>(
      `INSERT INTO rules (start_date, amount_minor_units, note, every_n, unit, last_generated_date)
       VALUES (?, ?, ?, ?, ?, NULL)`,
    );
    this._get = db.prepare<[RuleId], RuleRow>(`SELECT ${RULE_COLUMNS} FROM rules WHERE id = ?`);
    this._list = db.prepare<[], RuleRow>(`SELECT ${RULE_COLUMNS} FROM rules ORDER BY id`);
    this._advance = db.prepare<[IsoDate, RuleId, IsoDate]>(
      `UPDATE rules SET last_generated_date = ?
       WHERE id = ? AND (last_generated_date IS NULL OR last_generated_date < ?)`,
    );
    this._deleteEntries = db.prepare<[RuleId]>(`DELETE FROM entries WHERE rule_id = ?`);
    this._deleteRule = db.prepare<[RuleId]>(`DELETE FROM rules WHERE id = ?`);
  }

  /**
   * Create a rule and return its id.
   *
   * Validation order: unit, interval, start date, amount, note.
   * Throws INVALID_UNIT, NON_POSITIVE_INTERVAL, INVALID_DATE,
   * INVALID_AMOUNT or INVALID_NOTE before anything is written.
   */
  create(
    startDate: IsoDate,
    amountMinorUnits: number,
    note: string,
    everyN: number,
    unit: string,
  ): RuleId {
    assertUnit(unit);
    assertInterval(everyN);
    assertIsoDate(startDate, "start date");
    assertMinorUnits(amountMinorUnits);
    assertNote(note);

    return runAtomic(this._db, () =>
      Number(this._insert.run(startDate, amountMinorUnits, note, everyN, unit).lastInsertRowid),
    );
  }

  get(id: RuleId): Rule | undefined {
    assertStoreId(id, "rule");
    const row = this._get.get(id);
    return row === undefined ? undefined : toRule(row);
  }

  /**
   * Get a rule or throw RULE_NOT_FOUND.
   */
  require(id: RuleId): Rule {
    const rule = this.get(id);
    if (rule === undefined) {
      throw new LedgerError("RULE_NOT_FOUND", `Unknown rule: ${String(id)}`);
    }
    return rule;
  }

  /** All rules, oldest first. */
  list(): Rule[] {
    return this._list.all().map(toRule);
  }

  /**
   * Move the expansion cursor forward to `date`.
   * Returns false (and changes nothing) if the cursor is already at or
   * past `date`, or the rule does not exist.
   */
  advanceCursor(id: RuleId, date: IsoDate): boolean {
    assertStoreId(id, "rule");
    assertIsoDate(date, "cursor date");
    return runAtomic(this._db, () => this._advance.run(date, id, date).changes > 0);
  }

  /**
   * Delete a rule and every entry it generated, as one unit.
   * Manual entries and other rules' entries are untouched.
   */
  deleteWithEntries(id: RuleId): RuleDeletion {
    assertStoreId(id, "rule");
    return runAtomic(this._db, () => {
      const entriesDeleted = this._deleteEntries.run(id).changes;
      const ruleDeleted = this._deleteRule.run(id).changes > 0;
      return { ruleDeleted, entriesDeleted };
    });
  }
}
