/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. The schemas check
 * shape only; calendar validity, units and intervals are checked by the
 * engine, which reports its own failure codes.
 */

import { z } from "zod";
import { MAX_YEAR, MIN_YEAR } from "@ledgerloop/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const MinorUnitsSchema = z.number().int().safe();

export const IdParamSchema = z.coerce.number().int().positive().safe();

// =============================================================================
// Entry DTOs
// =============================================================================

export const CreateEntrySchema = z.object({
  date: IsoDateSchema,
  amountMinorUnits: MinorUnitsSchema,
  note: z.string().default(""),
  ruleId: z.number().int().positive().optional(),
});

export type CreateEntryDto = z.infer<typeof CreateEntrySchema>;

export const UpdateEntrySchema = z.object({
  date: IsoDateSchema,
  amountMinorUnits: MinorUnitsSchema,
  note: z.string().default(""),
});

export type UpdateEntryDto = z.infer<typeof UpdateEntrySchema>;

export const ListEntriesQuerySchema = z.object({
  date: IsoDateSchema,
});

export type ListEntriesQuery = z.infer<typeof ListEntriesQuerySchema>;

// =============================================================================
// Rule DTOs
// =============================================================================

export const CreateRuleSchema = z.object({
  startDate: IsoDateSchema,
  amountMinorUnits: MinorUnitsSchema,
  note: z.string().default(""),
  everyN: z.number().default(1),
  unit: z.string(),
  /** Expand through this date; defaults to the configured months ahead of the start month. */
  horizon: IsoDateSchema.optional(),
});

export type CreateRuleDto = z.infer<typeof CreateRuleSchema>;

export const GenerateRuleSchema = z.object({
  horizon: IsoDateSchema,
});

export type GenerateRuleDto = z.infer<typeof GenerateRuleSchema>;

// =============================================================================
// Balance / Calendar DTOs
// =============================================================================

export const BalanceRangeQuerySchema = z.object({
  from: IsoDateSchema,
  to: IsoDateSchema,
});

export type BalanceRangeQuery = z.infer<typeof BalanceRangeQuerySchema>;

export const CalendarParamsSchema = z.object({
  year: z.coerce.number().int().min(MIN_YEAR).max(MAX_YEAR),
  month: z.coerce.number().int().min(1).max(12),
});

export type CalendarParams = z.infer<typeof CalendarParamsSchema>;
