/**
 * Entry routes.
 *
 * POST   /api/v1/entries          — Insert an entry (idempotent per tuple)
 * GET    /api/v1/entries?date=    — Entries on one day, newest first
 * GET    /api/v1/entries/:id      — Get a single entry
 * PUT    /api/v1/entries/:id      — Overwrite date, amount and note
 * DELETE /api/v1/entries/:id      — Remove an entry
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateEntrySchema,
  IdParamSchema,
  ListEntriesQuerySchema,
  UpdateEntrySchema,
} from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { failureResponse } from "../middleware/error-handler.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEntryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/entries — Insert
  routes.post("/", validateBody(CreateEntrySchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const inserted = service.insert(body.date, body.amountMinorUnits, body.note, body.ruleId);
    if (!inserted.ok) {
      return failureResponse(c, inserted);
    }

    const entry = service.get(inserted.value);
    if (!entry.ok) {
      return failureResponse(c, entry);
    }
    return c.json({ data: entry.value }, 201);
  });

  // GET /api/v1/entries?date= — List one day
  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEntriesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const result = service.listByDate(queryResult.data.date);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  // GET /api/v1/entries/:id — Get
  routes.get("/:id", (c) => {
    const service = c.get("service");
    const id = IdParamSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("INVALID_ID", "Entry id must be a positive integer"), 400);
    }

    const result = service.get(id.data);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    if (result.value === undefined) {
      return c.json(createErrorEnvelope("ENTRY_NOT_FOUND", `Unknown entry: ${id.data}`), 404);
    }
    return c.json({ data: result.value });
  });

  // PUT /api/v1/entries/:id — Update
  routes.put("/:id", validateBody(UpdateEntrySchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const id = IdParamSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("INVALID_ID", "Entry id must be a positive integer"), 400);
    }

    const result = service.update(id.data, body.date, body.amountMinorUnits, body.note);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  // DELETE /api/v1/entries/:id — Delete
  routes.delete("/:id", (c) => {
    const service = c.get("service");
    const id = IdParamSchema.safeParse(c.req.param("id"));
    if (!id.success) {
      return c.json(createErrorEnvelope("INVALID_ID", "Entry id must be a positive integer"), 400);
    }

    const result = service.delete(id.data);
    if (!result.ok) {
      return failureResponse(c, result);
    }
    return c.json({ data: result.value });
  });

  return routes;
}
