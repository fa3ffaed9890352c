/**
 * @ledgerloop/ledger — SQLite-backed ledger database handle.
 *
 * One LedgerDatabase owns one SQLite connection and the stores built on
 * it. Callers open it, pass it to the recurrence engine and reconciler,
 * and close it when their session ends. There is no module-level
 * connection.
 *
 * Crash safety:
 * - File databases run in WAL mode with synchronous=NORMAL
 * - Every multi-step mutation goes through atomically(), a single
 *   SQLite transaction (nested calls become savepoints)
 * - Foreign keys are enforced, so rule deletion cascades in storage
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { LedgerStore } from "./ledger-store.js";
import { RuleStore } from "./rule-store.js";
import { migrate, readSchemaVersion } from "./schema.js";
import type { LedgerDatabaseOptions } from "./types.js";
import { runAtomic, toLedgerError } from "./atomic.js";

const MEMORY = ":memory:";
const DEFAULT_BUSY_TIMEOUT_MS = 3000;

export class LedgerDatabase {
  readonly entries: LedgerStore;
  readonly rules: RuleStore;
  readonly filePath: string;

  private readonly _db: Database.Database;

  private constructor(db: Database.Database, filePath: string) {
    this._db = db;
    this.filePath = filePath;
    this.entries = new LedgerStore(db);
    this.rules = new RuleStore(db);
  }

  /**
   * Open (creating if needed) and migrate a ledger database.
   *
   * The parent directory is created if it doesn't exist.
   */
  static open(options: LedgerDatabaseOptions): LedgerDatabase {
    const { filePath } = options;
    let db: Database.Database | undefined;

    try {
      if (filePath !== MEMORY) {
        mkdirSync(dirname(filePath), { recursive: true });
      }

      db = new Database(filePath);
      db.pragma("foreign_keys = ON");
      db.pragma(`busy_timeout = ${String(options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS)}`);
      if (filePath !== MEMORY) {
        db.pragma("journal_mode = WAL");
        db.pragma("synchronous = NORMAL");
      }

      migrate(db);
      return new LedgerDatabase(db, filePath);
    } catch (error) {
      db?.close();
      throw toLedgerError(error);
    }
  }

  /** Convenience for tests and throwaway sessions. */
  static inMemory(): LedgerDatabase {
    return LedgerDatabase.open({ filePath: MEMORY });
  }

  /**
   * Run several store calls as one atomic unit.
   */
  atomically<T>(fn: () => T): T {
    return runAtomic(this._db, fn);
  }

  get schemaVersion(): number {
    return readSchemaVersion(this._db);
  }

  get isOpen(): boolean {
    return this._db.open;
  }

  close(): void {
    if (this._db.open) {
      this._db.close();
    }
  }
}
