/**
 * Token mutation routes.
 *
 * POST /api/v1/mint          — Mint to any account (admin)
 * POST /api/v1/burn          — Burn from any account (admin)
 * POST /api/v1/transfer      — Transfer from the acting account
 * POST /api/v1/approve       — Approve a spender over the acting account
 * POST /api/v1/transfer-from — Spend the acting account's allowance
 *
 * The acting account is the API key's bound account, or the X-Account
 * header in unsecured mode.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { Address } from "@lapse/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  ApproveSchema,
  BurnSchema,
  MintSchema,
  TransferFromSchema,
  TransferSchema,
} from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { ACCOUNT_HEADER, requirePermission } from "../middleware/auth.js";
import { parseJsonBody } from "../middleware/validate.js";

function actingAccount(c: Context<AppEnv>): Address {
  const account = c.get("auth").account;
  if (account === undefined) {
    throw new ApiError(
      "ACCOUNT_REQUIRED",
      400,
      `No acting account: send the ${ACCOUNT_HEADER} header`,
    );
  }
  return account;
}

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/mint", requirePermission("admin"), async (c) => {
    const body = await parseJsonBody(c, MintSchema);
    const event = c.get("service").mint(body.to, body.amount);
    return c.json({ data: event }, 201);
  });

  routes.post("/burn", requirePermission("admin"), async (c) => {
    const body = await parseJsonBody(c, BurnSchema);
    const event = c.get("service").burn(body.from, body.amount);
    return c.json({ data: event });
  });

  routes.post("/transfer", requirePermission("write"), async (c) => {
    const body = await parseJsonBody(c, TransferSchema);
    const event = c.get("service").transfer(actingAccount(c), body.to, body.amount, body.epoch);
    return c.json({ data: event });
  });

  routes.post("/approve", requirePermission("write"), async (c) => {
    const body = await parseJsonBody(c, ApproveSchema);
    const event = c.get("service").approve(actingAccount(c), body.spender, body.amount);
    return c.json({ data: event });
  });

  routes.post("/transfer-from", requirePermission("write"), async (c) => {
    const body = await parseJsonBody(c, TransferFromSchema);
    const event = c.get("service").transferFrom(actingAccount(c), body.from, body.to, body.amount);
    return c.json({ data: event });
  });

  return routes;
}
