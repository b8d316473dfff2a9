/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one token.
 * Separated from main.ts so tests create the app without starting the
 * HTTP server.
 */

import { Hono } from "hono";
import { pino } from "pino";
import type { Logger } from "pino";
import type { ExpirableToken } from "@lapse/token";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { TokenService } from "./services/token-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { anonymousAuthMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { AccountBudgetStore, rateLimitMiddleware } from "./middleware/rate-limit.js";
import type { RateLimitConfig } from "./middleware/rate-limit.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMetricsRoute } from "./routes/metrics.js";
import { createTokenRoutes } from "./routes/token.js";
import { createOperationRoutes } from "./routes/operations.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly token: ExpirableToken;
  /** Application logger; silent when omitted */
  readonly logger?: Logger | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Most idempotent responses held at once */
  readonly idempotencyMaxEntries?: number | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  /** Rate limit configuration. Applied only together with auth. */
  readonly rateLimit?: RateLimitConfig | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: TokenService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
  readonly metricsCollector: MetricsCollector;
  readonly rateLimitStore: AccountBudgetStore | undefined;
}

export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const enableMetrics = options.enableMetrics !== false;
  const metricsCollector = new MetricsCollector();
  const service = new TokenService({
    token: options.token,
    logger,
    metrics: enableMetrics ? metricsCollector : undefined,
  });
  const idempotencyStore = new InMemoryIdempotencyStore({
    ttlMs: options.idempotencyTtlMs,
    maxEntries: options.idempotencyMaxEntries,
  });
  const rateLimitStore =
    options.auth !== undefined && options.rateLimit !== undefined
      ? new AccountBudgetStore(options.rateLimit)
      : undefined;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError((err, c) => {
    const response = handleError(err, c);
    if (response.status >= 500) {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    }
    return response;
  });

  app.notFound((c) => {
    return c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    );
  });

  // ─── Health & Metrics (no auth) ─────────────────────────────────
  app.route("/", createHealthRoutes(service));

  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    // Secured mode: auth → rate-limit
    app.use("/api/*", authMiddleware(options.auth));
    if (rateLimitStore !== undefined) {
      app.use("/api/*", rateLimitMiddleware(rateLimitStore));
    }
  } else {
    // Unsecured mode (tests, dev): anonymous admin, X-Account header
    app.use("/api/*", anonymousAuthMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  app.route("/api/v1", createTokenRoutes());
  app.route("/api/v1", createOperationRoutes());
  app.route("/api/v1", createAccountRoutes());
  app.route("/api/v1", createEventRoutes());

  return { app, service, idempotencyStore, metricsCollector, rateLimitStore };
}
