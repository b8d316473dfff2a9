/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMetricsRoute, PROMETHEUS_CONTENT_TYPE } from "./metrics.js";
export { createTokenRoutes } from "./token.js";
export { createOperationRoutes } from "./operations.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
