/**
 * Account query routes.
 *
 * GET /api/v1/accounts/:address/balance[?slot=n] — Live balance, or as of a slot
 * GET /api/v1/accounts/:address/buckets          — Stored buckets with expiry
 * GET /api/v1/allowances/:owner/:spender         — Allowance of spender over owner
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BalanceQuerySchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { parseQuery } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/accounts/:address/balance", requirePermission("read"), (c) => {
    const query = parseQuery(c, BalanceQuerySchema);
    return c.json({ data: c.get("service").balance(c.req.param("address"), query.slot) });
  });

  routes.get("/accounts/:address/buckets", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").buckets(c.req.param("address")) });
  });

  routes.get("/allowances/:owner/:spender", requirePermission("read"), (c) => {
    return c.json({
      data: c.get("service").allowance(c.req.param("owner"), c.req.param("spender")),
    });
  });

  return routes;
}
