/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createEntryRoutes } from "./entries.js";
export { createRuleRoutes } from "./rules.js";
export { createBalanceRoutes } from "./balances.js";
