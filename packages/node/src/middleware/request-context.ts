/**
 * Request context middleware.
 *
 * Gives each request an id (kept from X-Request-Id when the caller sends
 * one) and writes one log line per request through a pino child logger
 * bound to that id. Rejected requests carry the failure code from their
 * error envelope; requests that threw carry the error.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const FailureBodySchema = z.object({
  error: z.object({ code: z.string() }),
});

export function requestContext(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    const log = logger.child({ requestId });
    c.set("requestId", requestId);
    const start = Date.now();

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
    const status = c.res.status;
    const fields = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
    };

    if (status < 400) {
      log.info(fields, "Request completed");
      return;
    }

    const failure = { ...fields, failureCode: await failureCodeOf(c.res) };
    if (status >= 500) {
      log.error(c.error === undefined ? failure : { ...failure, err: c.error }, "Request failed");
    } else {
      log.warn(failure, "Request rejected");
    }
  };
}

async function failureCodeOf(res: Response): Promise<string | undefined> {
  if (!(res.headers.get("content-type") ?? "").startsWith("application/json")) {
    return undefined;
  }
  const parsed = FailureBodySchema.safeParse(await res.clone().json());
  return parsed.success ? parsed.data.error.code : undefined;
}
