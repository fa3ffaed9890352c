/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, failureResponse, statusForCode } from "./error-handler.js";
export { requestContext, REQUEST_ID_HEADER } from "./request-context.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedBodyEnv } from "./validate.js";
