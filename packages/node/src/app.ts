/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { BudgetService } from "./services/budget-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestContext } from "./middleware/request-context.js";
import { createHealthRoutes } from "./routes/health.js";
import { createEntryRoutes } from "./routes/entries.js";
import { createRuleRoutes } from "./routes/rules.js";
import { createBalanceRoutes } from "./routes/balances.js";
import { createErrorEnvelope } from "./types/error.js";
import type { LedgerDatabase } from "@ledgerloop/ledger";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly db: LedgerDatabase;
  /** Months past a viewed month that recurring rules are expanded. */
  readonly aheadMonths?: number;
  /** Root logger for request lines and service events; silent when omitted. */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: BudgetService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ enabled: false });
  const service = new BudgetService(options.db, {
    aheadMonths: options.aheadMonths,
    logger,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContext(logger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/entries", createEntryRoutes());
  app.route("/api/v1/rules", createRuleRoutes());
  app.route("/api/v1", createBalanceRoutes());

  return { app, service };
}
