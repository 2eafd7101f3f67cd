/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export type { InternalErrorLog } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseQuery, formatZodErrors } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export { computeETag, matchesIfNoneMatch, respondWithReport } from "./etag.js";
