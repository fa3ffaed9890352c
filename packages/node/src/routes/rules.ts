/**
 * Recurring rule routes.
 *
 * POST   /api/v1/rules               — Create, reconcile and expand a rule
 * GET    /api/v1/rules               — List rules, oldest first
 * POST   /api/v1/rules/:id/generate  — Expand a rule through a horizon
 * DELETE /api/v1/rules/:id           — Delete a rule and its entries
 */

import { Hono } from "hono";
import { horizonFor } from "@ledgerloop/recurrence";
import type { AppEnv } from "../types/api-contract.js";
import { CreateRuleSchema, GenerateRuleSchema, IdParamSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { failureResponse } from "../middleware/error-handler.js";
import { createErrorEnvelope } from "../types/error.js";

export function createRuleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/rules — Create + coalesce + expand
  routes.post("/", validateBody(CreateRuleSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    // The start date's month drives the default horizon; the engine
    // validates the full date itself.
    const horizon =
      body.horizon ??
      horizonFor(
        Number(body.startDate.slice(0, 4)),
        Number(body.startDate.slice(5, 7)),
        service.aheadMonths,
      );

    const result = service.addRecurring(
      body.startDate,
      body.amountMinorUnits,
      body.note,
      body.everyN,
      body.unit,
      horizon,
    );
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value }, 201);
  });

  // GET /api/v1/rules — List
  routes.get("/", (c) => {
    const result = c.get("service").listRules();
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  // POST /api/v1/rules/:id/generate — Expand
  routes.post("/:id/generate", validateBody(GenerateRuleSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const id = IdParamSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("INVALID_ID", "Rule id must be a positive integer"), 400);
    }

    const result = service.generateUntil(id.data, body.horizon);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  // DELETE /api/v1/rules/:id — Delete with entries
  routes.delete("/:id", (c) => {
    const service = c.get("service");
    const id = IdParamSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("INVALID_ID", "Rule id must be a positive integer"), 400);
    }

    const result = service.deleteRuleAndEntries(id.data);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  return routes;
}
