/**
 * @ledgerloop/node — Public API.
 *
 * The budget service, configuration and the Hono app factory. The HTTP
 * server itself is started by main.ts.
 */

export { BudgetService } from "./services/budget-service.js";
export type {
  BudgetServiceConfig,
  RecurringCreation,
  CalendarDay,
  CalendarMonth,
} from "./services/budget-service.js";
export { loadConfig, ConfigSchema, DEFAULT_DATABASE_PATH } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
