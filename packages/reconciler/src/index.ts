/**
 * @ledgerloop/reconciler — Manual-entry reconciliation.
 *
 * When a recurring rule is created from an entry the user already typed
 * in, the first occurrence must not appear twice. coalesceManualStart()
 * either adopts the manual entry as the rule's first occurrence or
 * removes it in favour of an already-generated one.
 */

export { Reconciler } from "./reconciler.js";

export type { CoalesceOutcome, CoalesceKind } from "./types.js";
