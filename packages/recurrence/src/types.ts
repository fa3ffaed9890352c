/**
 * @ledgerloop/recurrence domain types.
 */

import type { EntryId, IsoDate, RuleId } from "@ledgerloop/types";

/**
 * Outcome of expanding one rule up to a horizon.
 *
 * `produced` counts the occurrences visited in this run, including ones
 * whose entry already existed; `entryIds` lists their ids in date order.
 * `cursor` is the rule's cursor after the run (undefined while the rule
 * has never produced anything).
 */
export interface GenerationResult {
  readonly ruleId: RuleId;
  readonly produced: number;
  readonly entryIds: readonly EntryId[];
  readonly cursor?: IsoDate | undefined;
}
