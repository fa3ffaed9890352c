/**
 * HorizonTracker — Remembers how far every rule has been expanded.
 *
 * Viewing a month asks for all rules to reach a horizon some months past
 * it. Once that horizon (or a later one) has been reached, further
 * requests are free until a rule is created or deleted.
 */

import type { IsoDate } from "@ledgerloop/types";
import type { RecurrenceEngine } from "./recurrence-engine.js";
import type { GenerationResult } from "./types.js";

export class HorizonTracker {
  private readonly _engine: RecurrenceEngine;
  private _expandedThrough: IsoDate | undefined;

  constructor(engine: RecurrenceEngine) {
    this._engine = engine;
  }

  /** Furthest horizon already expanded, if still valid. */
  get expandedThrough(): IsoDate | undefined {
    return this._expandedThrough;
  }

  /**
   * Expand all rules through `horizon` unless a run already covered it.
   * Returns the per-rule results, or an empty list when nothing ran.
   */
  ensure(horizon: IsoDate): GenerationResult[] {
    if (this._expandedThrough !== undefined && horizon <= this._expandedThrough) {
      return [];
    }
    const results = this._engine.generateAllUntil(horizon);
    this._expandedThrough = horizon;
    return results;
  }

  /** Forget the cached horizon. Call after creating or deleting a rule. */
  invalidate(): void {
    this._expandedThrough = undefined;
  }
}
