/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { BudgetService } from "../services/budget-service.js";

/**
 * Hono environment type for the ledgerloop app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by the request context middleware) */
    requestId: string;

    /** The budget service bound to the open database */
    service: BudgetService;
  };
}
