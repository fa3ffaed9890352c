/**
 * Balance and calendar routes.
 *
 * GET /api/v1/balances/:date            — Running balance through a date
 * GET /api/v1/balances?from=&to=        — Day-by-day balances over a range
 * GET /api/v1/calendar/:year/:month     — Month view: rules expanded, entries
 *                                         and ending balance per day
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BalanceRangeQuerySchema, CalendarParamsSchema, IsoDateSchema } from "../types/dto.js";
import { formatZodErrors } from "../middleware/validate.js";
import { failureResponse } from "../middleware/error-handler.js";
import { createErrorEnvelope } from "../types/error.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/balances?from=&to=
  routes.get("/balances", (c) => {
    const queryResult = BalanceRangeQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { from, to } = queryResult.data;
    const result = c.get("service").dailyBalances(from, to);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  // GET /api/v1/balances/:date
  routes.get("/balances/:date", (c) => {
    const date = IsoDateSchema.safeParse(c.req.param("date"));
    if (!date.success) {
      return c.json(createErrorEnvelope("INVALID_DATE", "Expected YYYY-MM-DD"), 400);
    }

    const result = c.get("service").runningBalanceThrough(date.data);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: { date: date.data, balanceMinorUnits: result.value } });
  });

  // GET /api/v1/calendar/:year/:month
  routes.get("/calendar/:year/:month", (c) => {
    const params = CalendarParamsSchema.safeParse(c.req.param());
    if (!params.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid year or month", {
          issues: formatZodErrors(params.error),
        }),
        400,
      );
    }

    const result = c.get("service").calendarMonth(params.data.year, params.data.month);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  return routes;
}
