/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Also maps typed service
 * failures to HTTP responses, so both paths share one status table.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { FailureResult } from "@ledgerloop/types";
import { LedgerError } from "@ledgerloop/ledger";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

// =============================================================================
// Failure Code → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<ApiErrorCode, ContentfulStatusCode> = {
  // Validation
  VALIDATION_ERROR: 400,
  INVALID_DATE: 400,
  INVALID_AMOUNT: 400,
  INVALID_NOTE: 400,
  INVALID_UNIT: 400,
  NON_POSITIVE_INTERVAL: 400,
  INVALID_ID: 400,

  // Lookup
  NOT_FOUND: 404,
  ENTRY_NOT_FOUND: 404,
  RULE_NOT_FOUND: 404,

  // Constraint
  DUPLICATE_ENTRY: 409,

  // Storage / unknown
  STORAGE_FAILURE: 500,
  INTERNAL_ERROR: 500,
};

export function statusForCode(code: ApiErrorCode): ContentfulStatusCode {
  return STATUS_MAP[code];
}

/**
 * Render a typed service failure as an error envelope response.
 */
export function failureResponse(c: Context, result: FailureResult): Response {
  const status = statusForCode(result.error.code);
  const message = status === 500 ? "Internal server error" : result.error.message;
  return c.json(createErrorEnvelope(result.error.code, message), status);
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code: ApiErrorCode = err instanceof LedgerError ? err.code : "INTERNAL_ERROR";
  const status = statusForCode(code);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code, message), status);
}
