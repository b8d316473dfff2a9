/**
 * @lapse/node — HTTP service for an expirable token.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { TokenService, OPERATIONS_METRIC, REJECTIONS_METRIC } from "./services/token-service.js";
export type { TokenServiceOptions, TokenOperation } from "./services/token-service.js";
export {
  loadConfig,
  parseApiKeys,
  ConfigSchema,
  windowFromConfig,
  tokenConfigFromConfig,
  clockFromConfig,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
