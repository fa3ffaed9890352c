/**
 * Shared test helpers for @ledgerloop/ledger.
 */

import { LedgerError } from "../src/types.js";

/**
 * Run `fn` and return the LedgerError code it throws, or undefined if it
 * returns normally. Any other error is rethrown.
 */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof LedgerError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}
