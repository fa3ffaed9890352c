/**
 * @ledgerloop/ledger — Ledger Store.
 *
 * Durable table of individual monetary entries.
 *
 * API surface:
 * - insert() — Insert-or-return-existing (the single dedup point)
 * - update() — Overwrite date/amount/note, never the rule link
 * - delete() — Remove one entry
 * - get() / listByDate() / listBetween() — Reads
 * - runningBalanceThrough() / dailyTotals() — Balance queries over day_totals
 * - findManual() / findGenerated() / attachToRule() — Reconciliation primitives
 *
 * Insert conflicts are not errors: the id of the row already holding the
 * (date, amount, note, rule) tuple is returned instead.
 */

import type BetterSqlite3 from "better-sqlite3";
import type { DailyTotal, Entry, EntryId, IsoDate, RuleId } from "@ledgerloop/types";
import { isUniqueViolation, runAtomic } from "./atomic.js";
import { assertIsoDate } from "./date-math.js";
import type { DayTotalRow, EntryRow } from "./types.js";
import { LedgerError } from "./types.js";
import { assertMinorUnits, assertNote, assertStoreId } from "./validation.js";

const ENTRY_COLUMNS = "id, date, amount_minor_units, note, rule_id";

/**
 * Map a storage row to the Entry value type.
 * A NULL rule_id becomes an absent ruleId, never 0.
 */
export function toEntry(row: EntryRow): Entry {
  const entry: Entry = {
    id: row.id,
    date: row.date,
    amountMinorUnits: row.amount_minor_units,
    note: row.note,
  };
  return row.rule_id === null ? entry : { ...entry, ruleId: row.rule_id };
}

type EntryKey = [date: IsoDate, amount: number, note: string, ruleId: RuleId | null];

export class LedgerStore {
  private readonly _db: BetterSqlite3.Database;

  private readonly _insert: BetterSqlite3.Statement<EntryKey>;
  private readonly _findByKey: BetterSqlite3.Statement<EntryKey, { id: number }>;
  private readonly _ruleExists: BetterSqlite3.Statement<[RuleId], { id: number }>;
  private readonly _update: BetterSqlite3.Statement<[IsoDate, number, string, EntryId]>;
  private readonly _delete: BetterSqlite3.Statement<[EntryId]>;
  private readonly _get: BetterSqlite3.Statement<[EntryId], EntryRow>;
  private readonly _listByDate: BetterSqlite3.Statement<[IsoDate], EntryRow>;
  private readonly _listBetween: BetterSqlite3.Statement<[IsoDate, IsoDate], EntryRow>;
  private readonly _balanceThrough: BetterSqlite3.Statement<[IsoDate], { balance: number }>;
  private readonly _dailyTotals: BetterSqlite3.Statement<[IsoDate, IsoDate], DayTotalRow>;
  private readonly _findManual: BetterSqlite3.Statement<[IsoDate, number, string], EntryRow>;
  private readonly _findGenerated: BetterSqlite3.Statement<[IsoDate, number, string, RuleId], EntryRow>;
  private readonly _attach: BetterSqlite3.Statement<[RuleId, EntryId]>;
  private readonly _countByRule: BetterSqlite3.Statement<[RuleId], { n: number }>;
  private readonly _count: BetterSqlite3.Statement<[], { n: number }>;

  constructor(db: BetterSqlite3.Database) {
    this._db = db;

    this._insert = db.prepare<EntryKey>(
      `INSERT INTO entries (date, amount_minor_units, note, rule_id)
       VALUES (?, ?, ?, ?)
       ON CONFLICT DO NOTHING`,
    );
    this._findByKey = db.prepare<EntryKey, { id: number }>(
      `SELECT id FROM entries
       WHERE date = ? AND amount_minor_units = ? AND note = ? AND rule_id IS ?`,
    );
    this._ruleExists = db.prepare<[RuleId], { id: number }>(`SELECT id FROM rules WHERE id = ?`);
    this._update = db.prepare<[IsoDate, number, string, EntryId]>(
      `UPDATE entries SET date = ?, amount_minor_units = ?, note = ? WHERE id = ?`,
    );
    this._delete = db.prepare<[EntryId]>(`DELETE FROM entries WHERE id = ?`);
    this._get = db.prepare<[EntryId], EntryRow>(`SELECT ${ENTRY_COLUMNS} FROM entries WHERE id = ?`);
    this._listByDate = db.prepare<[IsoDate], EntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM entries WHERE date = ? ORDER BY id DESC`,
    );
    this._listBetween = db.prepare<[IsoDate, IsoDate], EntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM entries WHERE date BETWEEN ? AND ? ORDER BY date, id`,
    );
    this._balanceThrough = db.prepare<[IsoDate], { balance: number }>(
      `SELECT COALESCE(SUM(total_minor_units), 0) AS balance FROM day_totals WHERE date <= ?`,
    );
    this._dailyTotals = db.prepare<[IsoDate, IsoDate], DayTotalRow>(
      `SELECT date, total_minor_units FROM day_totals WHERE date BETWEEN ? AND ? ORDER BY date`,
    );
    this._findManual = db.prepare<[IsoDate, number, string], EntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM entries
       WHERE date = ? AND amount_minor_units = ? AND note = ? AND rule_id IS NULL
       ORDER BY id LIMIT 1`,
    );
    this._findGenerated = db.prepare<[IsoDate, number, string, RuleId], EntryRow>(
      `SELECT ${ENTRY_COLUMNS} FROM entries
       WHERE date = ? AND amount_minor_units = ? AND note = ? AND rule_id = ?
       ORDER BY id LIMIT 1`,
    );
    this._attach = db.prepare<[RuleId, EntryId]>(
      `UPDATE entries SET rule_id = ? WHERE id = ? AND rule_id IS NULL`,
    );
    this._countByRule = db.prepare<[RuleId], { n: number }>(
      `SELECT COUNT(*) AS n FROM entries WHERE rule_id = ?`,
    );
    this._count = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM entries`);
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Insert an entry unless the (date, amount, note, ruleId) tuple already
   * exists; either way, return the id of the row holding that tuple.
   *
   * Throws LedgerError (INVALID_*, RULE_NOT_FOUND, STORAGE_FAILURE).
   */
  insert(date: IsoDate, amountMinorUnits: number, note = "", ruleId?: RuleId): EntryId {
    assertIsoDate(date);
    assertMinorUnits(amountMinorUnits);
    assertNote(note);
    if (ruleId !== undefined) {
      assertStoreId(ruleId, "rule");
    }

    return runAtomic(this._db, () => {
      if (ruleId !== undefined && this._ruleExists.get(ruleId) === undefined) {
        throw new LedgerError("RULE_NOT_FOUND", `Unknown rule: ${String(ruleId)}`);
      }

      const key: EntryKey = [date, amountMinorUnits, note, ruleId ?? null];
      const info = this._insert.run(...key);
      if (info.changes > 0) {
        return Number(info.lastInsertRowid);
      }

      const existing = this._findByKey.get(...key);
      if (existing === undefined) {
        throw new LedgerError(
          "STORAGE_FAILURE",
          `Insert of ${date}/${String(amountMinorUnits)} was ignored but no matching entry exists`,
        );
      }
      return existing.id;
    });
  }

  /**
   * Overwrite date, amount and note of an entry. The rule link is kept.
   *
   * Throws ENTRY_NOT_FOUND for a missing id and DUPLICATE_ENTRY when the
   * new values would collide with another entry of the same rule.
   */
  update(id: EntryId, date: IsoDate, amountMinorUnits: number, note = ""): Entry {
    assertStoreId(id, "entry");
    assertIsoDate(date);
    assertMinorUnits(amountMinorUnits);
    assertNote(note);

    return runAtomic(this._db, () => {
      let changes: number;
      try {
        changes = this._update.run(date, amountMinorUnits, note, id).changes;
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new LedgerError(
            "DUPLICATE_ENTRY",
            `Entry ${String(id)} cannot be changed to ${date}/${String(amountMinorUnits)}/"${note}": an identical entry exists`,
            { cause: error },
          );
        }
        throw error;
      }

      const row = changes > 0 ? this._get.get(id) : undefined;
      if (row === undefined) {
        throw new LedgerError("ENTRY_NOT_FOUND", `Entry not found: ${String(id)}`);
      }
      return toEntry(row);
    });
  }

  /**
   * Remove one entry. Returns false when it was already gone.
   */
  delete(id: EntryId): boolean {
    assertStoreId(id, "entry");
    return runAtomic(this._db, () => this._delete.run(id).changes > 0);
  }

  /**
   * Link a manual entry to a rule. Entries that already carry a rule are
   * left alone; returns whether the link was made.
   */
  attachToRule(id: EntryId, ruleId: RuleId): boolean {
    assertStoreId(id, "entry");
    assertStoreId(ruleId, "rule");
    return runAtomic(this._db, () => {
      if (this._ruleExists.get(ruleId) === undefined) {
        throw new LedgerError("RULE_NOT_FOUND", `Unknown rule: ${String(ruleId)}`);
      }
      return this._attach.run(ruleId, id).changes > 0;
    });
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get(id: EntryId): Entry | undefined {
    assertStoreId(id, "entry");
    const row = this._get.get(id);
    return row === undefined ? undefined : toEntry(row);
  }

  /**
   * All entries on one day, most recently inserted first.
   */
  listByDate(date: IsoDate): Entry[] {
    assertIsoDate(date);
    return this._listByDate.all(date).map(toEntry);
  }

  /**
   * Entries in [from, to], by date then insertion order.
   */
  listBetween(from: IsoDate, to: IsoDate): Entry[] {
    assertRange(from, to);
    return this._listBetween.all(from, to).map(toEntry);
  }

  findManual(date: IsoDate, amountMinorUnits: number, note: string): Entry | undefined {
    const row = this._findManual.get(date, amountMinorUnits, note);
    return row === undefined ? undefined : toEntry(row);
  }

  findGenerated(
    date: IsoDate,
    amountMinorUnits: number,
    note: string,
    ruleId: RuleId,
  ): Entry | undefined {
    const row = this._findGenerated.get(date, amountMinorUnits, note, ruleId);
    return row === undefined ? undefined : toEntry(row);
  }

  countByRule(ruleId: RuleId): number {
    return this._countByRule.get(ruleId)?.n ?? 0;
  }

  count(): number {
    return this._count.get()?.n ?? 0;
  }

  // ─── Balance Queries ─────────────────────────────────────────────────

  /**
   * Sum of all amounts dated on or before `date`.
   * Reads the per-day aggregate, so cost grows with days, not entries.
   */
  runningBalanceThrough(date: IsoDate): number {
    assertIsoDate(date);
    return this._balanceThrough.get(date)?.balance ?? 0;
  }

  /**
   * Per-day sums in [from, to]. Days without entries are omitted.
   */
  dailyTotals(from: IsoDate, to: IsoDate): DailyTotal[] {
    assertRange(from, to);
    return this._dailyTotals.all(from, to).map((row) => ({
      date: row.date,
      totalMinorUnits: row.total_minor_units,
    }));
  }
}

function assertRange(from: IsoDate, to: IsoDate): void {
  assertIsoDate(from, "range start");
  assertIsoDate(to, "range end");
  if (from > to) {
    throw new LedgerError("INVALID_DATE", `Range start ${from} is after range end ${to}`);
  }
}
