/**
 * @ledgerloop/ledger — Schema and migrations.
 *
 * The tables carry the invariants the rest of the engine relies on:
 * - A unique expression index over (date, amount, note, rule) makes
 *   insert idempotent, with "no rule" folded to a single key value
 *   (SQLite would otherwise treat every NULL rule_id as distinct)
 * - rule_id cascades on rule deletion
 * - unit is restricted by a CHECK constraint
 * - day_totals is kept in step with entries by triggers, so balances
 *   read one row per day instead of one row per entry
 *
 * The schema version lives in PRAGMA user_version. Each migration runs
 * in its own transaction; opening an up-to-date database is a no-op.
 */

import type BetterSqlite3 from "better-sqlite3";
import { LedgerError } from "./types.js";

export interface Migration {
  readonly version: number;
  readonly description: string;
  readonly statements: readonly string[];
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: "entries and rules",
    statements: [
      `CREATE TABLE IF NOT EXISTS rules (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        start_date TEXT NOT NULL,
        amount_minor_units INTEGER NOT NULL,
        note TEXT NOT NULL DEFAULT '',
        every_n INTEGER NOT NULL CHECK (every_n >= 1),
        unit TEXT NOT NULL CHECK (unit IN ('day', 'week', 'month')),
        last_generated_date TEXT
      )`,
      `CREATE TABLE IF NOT EXISTS entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        date TEXT NOT NULL,
        amount_minor_units INTEGER NOT NULL,
        note TEXT NOT NULL DEFAULT '',
        rule_id INTEGER REFERENCES rules(id) ON DELETE CASCADE
      )`,
      `CREATE INDEX IF NOT EXISTS idx_entries_date ON entries(date)`,
      `CREATE UNIQUE INDEX IF NOT EXISTS ux_entries_identity
        ON entries(date, amount_minor_units, note, IFNULL(rule_id, 0))`,
    ],
  },
  {
    version: 2,
    description: "rule lookup index",
    statements: [`CREATE INDEX IF NOT EXISTS idx_entries_rule ON entries(rule_id)`],
  },
  {
    version: 3,
    description: "per-day totals",
    statements: [
      `CREATE TABLE IF NOT EXISTS day_totals (
        date TEXT PRIMARY KEY,
        total_minor_units INTEGER NOT NULL,
        entry_count INTEGER NOT NULL
      ) WITHOUT ROWID`,
      `CREATE TRIGGER IF NOT EXISTS trg_entries_after_insert AFTER INSERT ON entries
      BEGIN
        INSERT INTO day_totals (date, total_minor_units, entry_count)
        VALUES (NEW.date, NEW.amount_minor_units, 1)
        ON CONFLICT (date) DO UPDATE SET
          total_minor_units = total_minor_units + excluded.total_minor_units,
          entry_count = entry_count + 1;
      END`,
      `CREATE TRIGGER IF NOT EXISTS trg_entries_after_delete AFTER DELETE ON entries
      BEGIN
        UPDATE day_totals SET
          total_minor_units = total_minor_units - OLD.amount_minor_units,
          entry_count = entry_count - 1
        WHERE date = OLD.date;
        DELETE FROM day_totals WHERE date = OLD.date AND entry_count <= 0;
      END`,
      `CREATE TRIGGER IF NOT EXISTS trg_entries_after_update
      AFTER UPDATE OF date, amount_minor_units ON entries
      BEGIN
        UPDATE day_totals SET
          total_minor_units = total_minor_units - OLD.amount_minor_units,
          entry_count = entry_count - 1
        WHERE date = OLD.date;
        DELETE FROM day_totals WHERE date = OLD.date AND entry_count <= 0;
        INSERT INTO day_totals (date, total_minor_units, entry_count)
        VALUES (NEW.date, NEW.amount_minor_units, 1)
        ON CONFLICT (date) DO UPDATE SET
          total_minor_units = total_minor_units + excluded.total_minor_units,
          entry_count = entry_count + 1;
      END`,
      // Backfill for databases that already hold entries
      `DELETE FROM day_totals`,
      `INSERT INTO day_totals (date, total_minor_units, entry_count)
        SELECT date, SUM(amount_minor_units), COUNT(*) FROM entries GROUP BY date`,
    ],
  },
];

/** Highest schema version this build knows how to produce. */
export const SCHEMA_VERSION = MIGRATIONS.reduce((max, m) => Math.max(max, m.version), 0);

/**
 * Read the schema version stored in the database file.
 */
export function readSchemaVersion(db: BetterSqlite3.Database): number {
  const raw = db.pragma("user_version", { simple: true });
  return typeof raw === "number" ? raw : 0;
}

/**
 * Apply every migration newer than the stored version.
 * Returns the versions that were applied, in order.
 *
 * Throws LedgerError if the file was written by a newer schema.
 */
export function migrate(
  db: BetterSqlite3.Database,
  migrations: readonly Migration[] = MIGRATIONS,
): readonly number[] {
  const current = readSchemaVersion(db);
  const latest = migrations.reduce((max, m) => Math.max(max, m.version), 0);

  if (current > latest) {
    throw new LedgerError(
      "STORAGE_FAILURE",
      `Database schema version ${String(current)} is newer than supported version ${String(latest)}`,
    );
  }

  const pending = [...migrations]
    .filter((m) => m.version > current)
    .sort((a, b) => a.version - b.version);

  const applied: number[] = [];
  for (const migration of pending) {
    const apply = db.transaction(() => {
      for (const statement of migration.statements) {
        db.exec(statement);
      }
      db.pragma(`user_version = ${String(migration.version)}`);
    });
    apply();
    applied.push(migration.version);
  }

  return applied;
}
