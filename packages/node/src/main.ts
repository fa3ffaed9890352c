/**
 * @ledgerloop/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the database, starts the
 * HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { LedgerDatabase } from "@ledgerloop/ledger";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const db = LedgerDatabase.open({
    filePath: config.DATABASE_PATH,
    busyTimeoutMs: config.BUSY_TIMEOUT_MS,
  });
  logger.info({ path: db.filePath, schemaVersion: db.schemaVersion }, "Database opened");

  const { app } = createApp({
    db,
    aheadMonths: config.AHEAD_MONTHS,
    logger,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST },
    "ledgerloop node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    db.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
