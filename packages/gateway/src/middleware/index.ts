/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export {
  identityMiddleware,
  INVALID_FORMAT_MESSAGE,
  INVALID_TOKEN_MESSAGE,
  MISSING_HEADER_MESSAGE,
} from "./identity.js";
export type { IdentityMiddlewareOptions } from "./identity.js";
