/**
 * Rate limiting middleware — one credit budget per bound account.
 *
 * Every API key acts for an account, and keys bound to the same account
 * draw on the same budget. A budget holds `burst` credits and refills at
 * `rpm` credits a minute. Reads cost one credit, token mutations (POST)
 * cost `writeCost`. An empty budget answers 429 with Retry-After.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Credit Budgets
// =============================================================================

export interface RateLimitConfig {
  /** Credits refilled per minute */
  readonly rpm: number;
  /** Budget capacity */
  readonly burst: number;
  /** Credits a POST costs; default 1 */
  readonly writeCost?: number | undefined;
}

export interface SpendResult {
  readonly allowed: boolean;
  readonly remaining: number;
  readonly retryAfterMs: number;
}

interface Budget {
  readonly credits: number;
  readonly updatedAt: number;
}

export class AccountBudgetStore {
  private readonly _budgets = new Map<string, Budget>();
  private readonly _rpm: number;
  private readonly _burst: number;
  private readonly _writeCost: number;
  private readonly _now: () => number;

  constructor(config: RateLimitConfig, now: () => number = Date.now) {
    this._rpm = config.rpm;
    this._burst = config.burst;
    this._writeCost = config.writeCost ?? 1;
    this._now = now;
  }

  /** Credits a request with this method costs. */
  costOf(method: string): number {
    return method === "POST" ? this._writeCost : 1;
  }

  /**
   * Take `cost` credits from the budget under `key`. A cost above the
   * capacity is charged as the full capacity, so it can still succeed.
   */
  spend(key: string, cost = 1): SpendResult {
    const now = this._now();
    const budget = this._budgets.get(key);
    const credits =
      budget === undefined
        ? this._burst
        : Math.min(this._burst, budget.credits + (Math.max(0, now - budget.updatedAt) * this._rpm) / 60000);
    const price = Math.min(cost, this._burst);

    if (credits >= price) {
      this._budgets.set(key, { credits: credits - price, updatedAt: now });
      return { allowed: true, remaining: Math.floor(credits - price), retryAfterMs: 0 };
    }

    this._budgets.set(key, { credits, updatedAt: now });
    return {
      allowed: false,
      remaining: Math.floor(credits),
      retryAfterMs: Math.ceil(((price - credits) * 60000) / this._rpm),
    };
  }

  get size(): number {
    return this._budgets.size;
  }

  clear(): void {
    this._budgets.clear();
  }
}

/**
 * Budget key for a caller: its bound account, or its identity when it
 * acts for none.
 */
export function rateLimitKey(auth: AuthContext): string {
  return auth.account === undefined ? `identity:${auth.identity}` : `account:${auth.account}`;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Must run AFTER auth middleware.
 */
export function rateLimitMiddleware(
  store: AccountBudgetStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const result = store.spend(rateLimitKey(c.get("auth")), store.costOf(c.req.method));

    c.header("X-RateLimit-Remaining", String(result.remaining));

    if (!result.allowed) {
      const retryAfterSec = Math.ceil(result.retryAfterMs / 1000);
      c.header("Retry-After", String(retryAfterSec));
      return c.json(
        createErrorEnvelope(
          "RATE_LIMITED",
          `Rate limit exceeded. Retry after ${String(retryAfterSec)} seconds.`,
        ),
        429,
      );
    }

    return next();
  };
}
