/**
 * Type barrel — re-exports all public types from @ledgerloop/node.
 */

// DTOs
export {
  IsoDateSchema,
  MinorUnitsSchema,
  IdParamSchema,
  CreateEntrySchema,
  UpdateEntrySchema,
  ListEntriesQuerySchema,
  CreateRuleSchema,
  GenerateRuleSchema,
  BalanceRangeQuerySchema,
  CalendarParamsSchema,
} from "./dto.js";
export type {
  CreateEntryDto,
  UpdateEntryDto,
  ListEntriesQuery,
  CreateRuleDto,
  GenerateRuleDto,
  BalanceRangeQuery,
  CalendarParams,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
