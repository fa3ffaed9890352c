/**
 * BudgetService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Every operation returns a typed Result: domain
 * packages throw LedgerError, and this is the one place those errors
 * become values.
 */

import type { Logger } from "pino";
import type {
  DailyBalance,
  Entry,
  EntryId,
  IsoDate,
  Result,
  Rule,
  RuleId,
} from "@ledgerloop/types";
import { fail, ok } from "@ledgerloop/types";
import { BalanceCalculator, endOfMonth, startOfMonth, toLedgerError } from "@ledgerloop/ledger";
import type { LedgerDatabase, RuleDeletion } from "@ledgerloop/ledger";
import {
  DEFAULT_AHEAD_MONTHS,
  HorizonTracker,
  RecurrenceEngine,
  horizonFor,
} from "@ledgerloop/recurrence";
import type { GenerationResult } from "@ledgerloop/recurrence";
import { Reconciler } from "@ledgerloop/reconciler";
import type { CoalesceOutcome } from "@ledgerloop/reconciler";

// =============================================================================
// Configuration
// =============================================================================

export interface BudgetServiceConfig {
  /** How many months past a viewed month recurring rules are expanded. */
  readonly aheadMonths?: number | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Result Shapes
// =============================================================================

export interface RecurringCreation {
  readonly ruleId: RuleId;
  readonly coalesce: CoalesceOutcome;
  readonly generation: GenerationResult;
}

export interface CalendarDay extends DailyBalance {
  readonly entries: readonly Entry[];
}

export interface CalendarMonth {
  readonly year: number;
  readonly month: number;
  readonly horizon: IsoDate;
  readonly days: readonly CalendarDay[];
}

// =============================================================================
// Service
// =============================================================================

export class BudgetService {
  readonly db: LedgerDatabase;
  readonly engine: RecurrenceEngine;
  readonly reconciler: Reconciler;
  readonly horizons: HorizonTracker;
  readonly balances: BalanceCalculator;
  readonly aheadMonths: number;

  private readonly _logger: Logger | undefined;

  constructor(db: LedgerDatabase, config: BudgetServiceConfig = {}) {
    this.db = db;
    this.engine = new RecurrenceEngine(db);
    this.reconciler = new Reconciler(db);
    this.horizons = new HorizonTracker(this.engine);
    this.balances = new BalanceCalculator(db.entries);
    this.aheadMonths = config.aheadMonths ?? DEFAULT_AHEAD_MONTHS;
    this._logger = config.logger;
  }

  isReady(): boolean {
    return this.db.isOpen;
  }

  close(): void {
    this.db.close();
  }

  // ─── Entries ───────────────────────────────────────────────────────

  insert(date: IsoDate, amountMinorUnits: number, note: string, ruleId?: RuleId): Result<EntryId> {
    return this.run("insert", () => this.db.entries.insert(date, amountMinorUnits, note, ruleId));
  }

  update(id: EntryId, date: IsoDate, amountMinorUnits: number, note: string): Result<Entry> {
    return this.run("update", () => this.db.entries.update(id, date, amountMinorUnits, note));
  }

  delete(id: EntryId): Result<{ readonly deleted: boolean }> {
    return this.run("delete", () => ({ deleted: this.db.entries.delete(id) }));
  }

  get(id: EntryId): Result<Entry | undefined> {
    return this.run("get", () => this.db.entries.get(id));
  }

  listByDate(date: IsoDate): Result<Entry[]> {
    return this.run("listByDate", () => this.db.entries.listByDate(date));
  }

  // ─── Balances ──────────────────────────────────────────────────────

  runningBalanceThrough(date: IsoDate): Result<number> {
    return this.run("runningBalanceThrough", () => this.db.entries.runningBalanceThrough(date));
  }

  dailyBalances(from: IsoDate, to: IsoDate): Result<DailyBalance[]> {
    return this.run("dailyBalances", () => this.balances.dailyBalances(from, to));
  }

  monthBalances(year: number, month: number): Result<DailyBalance[]> {
    return this.run("monthBalances", () => this.balances.monthBalances(year, month));
  }

  /**
   * Everything a month view needs: rules expanded to the month's horizon,
   * then each day's entries and ending balance.
   */
  calendarMonth(year: number, month: number): Result<CalendarMonth> {
    return this.run("calendarMonth", () => {
      const horizon = horizonFor(year, month, this.aheadMonths);
      this.ensureExpanded(horizon);

      const byDate = new Map<IsoDate, Entry[]>();
      for (const entry of this.db.entries.listBetween(
        startOfMonth(year, month),
        endOfMonth(year, month),
      )) {
        const list = byDate.get(entry.date) ?? [];
        list.push(entry);
        byDate.set(entry.date, list);
      }

      const days = this.balances.monthBalances(year, month).map((balance) => ({
        ...balance,
        entries: byDate.get(balance.date) ?? [],
      }));
      return { year, month, horizon, days };
    });
  }

  // ─── Rules ─────────────────────────────────────────────────────────

  createRule(
    startDate: IsoDate,
    amountMinorUnits: number,
    note: string,
    everyN: number,
    unit: string,
  ): Result<RuleId> {
    return this.run("createRule", () => {
      const ruleId = this.db.rules.create(startDate, amountMinorUnits, note, everyN, unit);
      this.horizons.invalidate();
      return ruleId;
    });
  }

  listRules(): Result<Rule[]> {
    return this.run("listRules", () => this.db.rules.list());
  }

  generateUntil(ruleId: RuleId, horizon: IsoDate): Result<GenerationResult> {
    return this.run("generateUntil", () => {
      const result = this.engine.generateUntil(ruleId, horizon);
      this._logger?.debug({ ruleId, horizon, produced: result.produced }, "Rule expanded");
      return result;
    });
  }

  coalesceManualStart(ruleId: RuleId): Result<CoalesceOutcome> {
    return this.run("coalesceManualStart", () => {
      const outcome = this.reconciler.coalesceManualStart(ruleId);
      this._logger?.debug({ ruleId, outcome: outcome.kind }, "Manual start coalesced");
      return outcome;
    });
  }

  deleteRuleAndEntries(ruleId: RuleId): Result<RuleDeletion> {
    return this.run("deleteRuleAndEntries", () => {
      const deletion = this.db.rules.deleteWithEntries(ruleId);
      this.horizons.invalidate();
      return deletion;
    });
  }

  /**
   * Save path for a repeating transaction: create the rule, fold in a
   * matching manual entry, then expand through `horizon`. All or nothing.
   */
  addRecurring(
    startDate: IsoDate,
    amountMinorUnits: number,
    note: string,
    everyN: number,
    unit: string,
    horizon: IsoDate,
  ): Result<RecurringCreation> {
    return this.run("addRecurring", () => {
      const creation = this.db.atomically(() => {
        const ruleId = this.db.rules.create(startDate, amountMinorUnits, note, everyN, unit);
        const coalesce = this.reconciler.coalesceManualStart(ruleId);
        const generation = this.engine.generateUntil(ruleId, horizon);
        return { ruleId, coalesce, generation };
      });
      this.horizons.invalidate();
      this._logger?.info(
        {
          ruleId: creation.ruleId,
          coalesce: creation.coalesce.kind,
          produced: creation.generation.produced,
        },
        "Recurring rule added",
      );
      return creation;
    });
  }

  /**
   * Expand every rule through `horizon` unless an earlier call already did.
   */
  ensureHorizon(horizon: IsoDate): Result<readonly GenerationResult[]> {
    return this.run("ensureHorizon", () => this.ensureExpanded(horizon));
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private ensureExpanded(horizon: IsoDate): readonly GenerationResult[] {
    const results = this.horizons.ensure(horizon);
    if (results.length > 0) {
      this._logger?.debug({ horizon, rules: results.length }, "Rules expanded to horizon");
    }
    return results;
  }

  private run<T>(operation: string, fn: () => T): Result<T> {
    try {
      return ok(fn());
    } catch (error) {
      const ledgerError = toLedgerError(error);
      if (ledgerError.code === "STORAGE_FAILURE") {
        this._logger?.error({ operation, err: ledgerError }, "Storage failure");
      } else {
        this._logger?.warn(
          { operation, code: ledgerError.code },
          ledgerError.message,
        );
      }
      return fail(ledgerError.code, ledgerError.message);
    }
  }
}
