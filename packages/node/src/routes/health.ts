/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (503 until the clock reaches the window genesis)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TokenService } from "../services/token-service.js";

export function createHealthRoutes(service: TokenService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        token: service.token.symbol,
        tick: service.token.now(),
        genesisTick: service.token.windowConfig.genesisTick,
        accounts: service.token.ledger.accounts().length,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
