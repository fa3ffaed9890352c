/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (database open and migrated)
 */

import { Hono } from "hono";
import { SCHEMA_VERSION } from "@ledgerloop/ledger";
import type { AppEnv } from "../types/api-contract.js";
import type { BudgetService } from "../services/budget-service.js";

export function createHealthRoutes(service: BudgetService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady() && service.db.schemaVersion === SCHEMA_VERSION;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        schemaVersion: ready ? SCHEMA_VERSION : undefined,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
