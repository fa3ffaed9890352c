/**
 * Tests for balance and calendar routes.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";
import type { AppInstance } from "../src/app.js";

interface ErrorBody {
  error: { code: string };
}

let instance: AppInstance;

beforeEach(async () => {
  instance = createTestApp();
  for (const entry of [
    { date: "2025-01-01", amountMinorUnits: 1000, note: "pay" },
    { date: "2025-01-05", amountMinorUnits: -300, note: "bill" },
    { date: "2025-01-10", amountMinorUnits: 50, note: "refund" },
  ]) {
    await instance.app.request(jsonRequest("/api/v1/entries", "POST", entry));
  }
});

afterEach(() => {
  instance.service.close();
});

describe("GET /api/v1/balances/:date", () => {
  it("returns the running balance through the date", async () => {
    const res = await instance.app.request("/api/v1/balances/2025-01-07");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { date: "2025-01-07", balanceMinorUnits: 700 } });
  });

  it("rejects a malformed date", async () => {
    const res = await instance.app.request("/api/v1/balances/tomorrow");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_DATE");
  });
});

describe("GET /api/v1/balances?from=&to=", () => {
  it("returns one row per day", async () => {
    const res = await instance.app.request("/api/v1/balances?from=2025-01-04&to=2025-01-06");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: [
        { date: "2025-01-04", dayTotalMinorUnits: 0, balanceMinorUnits: 1000 },
        { date: "2025-01-05", dayTotalMinorUnits: -300, balanceMinorUnits: 700 },
        { date: "2025-01-06", dayTotalMinorUnits: 0, balanceMinorUnits: 700 },
      ],
    });
  });

  it("requires both ends of the range", async () => {
    const res = await instance.app.request("/api/v1/balances?from=2025-01-04");

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/calendar/:year/:month", () => {
  it("expands rules ahead and returns every day of the month", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/rules", "POST", {
        startDate: "2025-01-20",
        amountMinorUnits: -200,
        note: "phone",
        unit: "month",
        horizon: "2025-01-31",
      }),
    );

    const res = await instance.app.request("/api/v1/calendar/2025/2");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      data: {
        horizon: string;
        days: { date: string; balanceMinorUnits: number; entries: { note: string }[] }[];
      };
    };
    expect(body.data.horizon).toBe("2025-04-30");
    expect(body.data.days).toHaveLength(28);
    expect(body.data.days[0]?.balanceMinorUnits).toBe(550);
    expect(body.data.days[19]?.entries.map((e) => e.note)).toEqual(["phone"]);
    expect(body.data.days[27]?.balanceMinorUnits).toBe(350);
  });

  it("rejects month 13", async () => {
    const res = await instance.app.request("/api/v1/calendar/2025/13");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});
