/**
 * @ledgerloop/recurrence — Recurring-rule expansion.
 *
 * Turns rules ("every N days / weeks / months from a start date") into
 * concrete ledger entries up to a horizon date:
 * - advance(): step from one occurrence to the next
 * - RecurrenceEngine: resumable, idempotent expansion per rule
 * - horizonFor() / HorizonTracker: how far ahead to expand, and when
 *   expansion can be skipped
 */

export { advance } from "./advance.js";
export { RecurrenceEngine } from "./recurrence-engine.js";
export { HorizonTracker } from "./horizon-tracker.js";
export { horizonFor, DEFAULT_AHEAD_MONTHS } from "./horizon.js";

export type { GenerationResult } from "./types.js";
