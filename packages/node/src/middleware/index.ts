/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export {
  authMiddleware,
  actorHeaderMiddleware,
  assertOwner,
  API_KEY_HEADER,
  ACTOR_HEADER,
  ANONYMOUS_IDENTITY,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
