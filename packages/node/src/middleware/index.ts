/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { requireCaller, CALLER_HEADER } from "./caller.js";
export { readBody, parseInput, RequestValidationError } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
