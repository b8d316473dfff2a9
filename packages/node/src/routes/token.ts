/**
 * Token metadata routes.
 *
 * GET /api/v1/token  — Name, symbol, decimals, window configuration, live supply
 * GET /api/v1/window — Current tick, epoch, era/slot and live frame
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/token", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").info() });
  });

  routes.get("/window", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").window() });
  });

  return routes;
}
