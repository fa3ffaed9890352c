/**
 * Tests for error handler middleware.
 *
 * Verifies engine failure codes are mapped to the right HTTP status codes
 * and the error envelope format, for thrown errors and typed failures.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { LedgerError } from "@ledgerloop/ledger";
import { fail } from "@ledgerloop/types";
import { failureResponse, handleError, statusForCode } from "../../src/middleware/error-handler.js";

function appThrowing(error: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

describe("statusForCode", () => {
  it("maps failure classes to statuses", () => {
    expect(statusForCode("INVALID_DATE")).toBe(400);
    expect(statusForCode("NON_POSITIVE_INTERVAL")).toBe(400);
    expect(statusForCode("RULE_NOT_FOUND")).toBe(404);
    expect(statusForCode("DUPLICATE_ENTRY")).toBe(409);
    expect(statusForCode("STORAGE_FAILURE")).toBe(500);
  });
});

describe("handleError", () => {
  it("renders a thrown LedgerError with its code", async () => {
    const res = await appThrowing(new LedgerError("INVALID_UNIT", "Unknown unit")).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: { code: "INVALID_UNIT", message: "Unknown unit" } });
  });

  it("hides the message of a storage failure", async () => {
    const res = await appThrowing(new LedgerError("STORAGE_FAILURE", "disk I/O error")).request(
      "/boom",
    );

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "STORAGE_FAILURE", message: "Internal server error" },
    });
  });

  it("treats unknown errors as internal", async () => {
    const res = await appThrowing(new Error("unexpected")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});

describe("failureResponse", () => {
  it("renders a typed failure", async () => {
    const app = new Hono();
    app.get("/missing", (c) => failureResponse(c, fail("ENTRY_NOT_FOUND", "Entry not found: 4")));

    const res = await app.request("/missing");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "ENTRY_NOT_FOUND", message: "Entry not found: 4" },
    });
  });
});
