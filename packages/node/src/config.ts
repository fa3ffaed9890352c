/**
 * @ledgerloop/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_DATABASE_PATH = join(homedir(), ".ledgerloop", "ledgerloop.db");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  DATABASE_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(3000),

  // Recurrence
  AHEAD_MONTHS: z.coerce.number().int().min(0).max(120).default(12),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
