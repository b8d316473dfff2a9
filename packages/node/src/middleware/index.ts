/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForCode, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseJsonBody, parseQuery, formatZodErrors } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type {
  IdempotencyStore,
  IdempotencyStoreOptions,
  CachedResponse,
} from "./idempotency.js";
export {
  authMiddleware,
  anonymousAuthMiddleware,
  requirePermission,
  API_KEY_HEADER,
  ACCOUNT_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { rateLimitMiddleware, rateLimitKey, AccountBudgetStore } from "./rate-limit.js";
export type { RateLimitConfig, SpendResult } from "./rate-limit.js";
export {
  metricsMiddleware,
  MetricsCollector,
  normalizeMetricsPath,
} from "./metrics.js";
