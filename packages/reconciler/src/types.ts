/**
 * @ledgerloop/reconciler domain types.
 *
 * A rule created from a manually entered transaction would otherwise
 * produce a second entry for its first occurrence. Coalescing decides
 * which of the two survives.
 */

import type { EntryId, RuleId } from "@ledgerloop/types";

export type CoalesceOutcome =
  | { readonly kind: "rule-missing"; readonly ruleId: RuleId }
  | { readonly kind: "no-manual-entry"; readonly ruleId: RuleId }
  // A generated twin already existed, so the manual entry was deleted
  | {
      readonly kind: "removed-duplicate";
      readonly ruleId: RuleId;
      readonly removedEntryId: EntryId;
      readonly keptEntryId: EntryId;
    }
  // The manual entry now belongs to the rule and stands for its first occurrence
  | { readonly kind: "reparented"; readonly ruleId: RuleId; readonly entryId: EntryId };

export type CoalesceKind = CoalesceOutcome["kind"];
