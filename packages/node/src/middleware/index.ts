/**
 * Middleware barrel.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery, RequestValidationError } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  requirePermission,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
