/**
 * Tests for the per-account rate limiter.
 *
 * Verifies:
 * - Burst, refill and Retry-After arithmetic
 * - Mutations cost the configured write cost
 * - Keys bound to one account share its budget
 */

import { describe, it, expect } from "vitest";
import { AccountBudgetStore, rateLimitKey } from "../../src/middleware/rate-limit.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { ALICE, BOB, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function keyMap(keys: readonly ApiKeyRecord[]): Map<string, ApiKeyRecord> {
  return new Map(keys.map((k) => [k.key, k]));
}

describe("AccountBudgetStore", () => {
  it("allows a burst, then refills at the configured rate", () => {
    let now = 0;
    const store = new AccountBudgetStore({ rpm: 60, burst: 2 }, () => now);

    expect(store.spend("k")).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
    expect(store.spend("k")).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });
    expect(store.spend("k")).toEqual({ allowed: false, remaining: 0, retryAfterMs: 1000 });

    now = 500;
    expect(store.spend("k")).toEqual({ allowed: false, remaining: 0, retryAfterMs: 500 });

    now = 1_000;
    expect(store.spend("k").allowed).toBe(true);
  });

  it("charges a cost and reports what is left after a refusal", () => {
    const store = new AccountBudgetStore({ rpm: 60, burst: 3 }, () => 0);

    expect(store.spend("k", 2)).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
    expect(store.spend("k", 2)).toEqual({ allowed: false, remaining: 1, retryAfterMs: 1000 });
    expect(store.spend("k", 1)).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });
  });

  it("charges a cost above the capacity as the full capacity", () => {
    const store = new AccountBudgetStore({ rpm: 60, burst: 2 }, () => 0);
    expect(store.spend("k", 5)).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });
  });

  it("prices POST at the write cost and everything else at one", () => {
    const store = new AccountBudgetStore({ rpm: 60, burst: 5, writeCost: 3 });
    expect(store.costOf("POST")).toBe(3);
    expect(store.costOf("GET")).toBe(1);
    expect(new AccountBudgetStore({ rpm: 60, burst: 5 }).costOf("POST")).toBe(1);
  });
});

describe("rateLimitKey", () => {
  it("keys on the bound account, else on the identity", () => {
    expect(rateLimitKey({ type: "api-key", identity: "k1", role: "viewer", account: ALICE })).toBe(
      `account:${ALICE}`,
    );
    expect(rateLimitKey({ type: "anonymous", identity: "anonymous", role: "admin", account: undefined })).toBe(
      "identity:anonymous",
    );
  });
});

describe("rate limit middleware", () => {
  it("answers 429 with Retry-After once the burst is spent", async () => {
    const { app } = createTestApp({
      auth: { apiKeys: keyMap([{ key: "viewer", role: "viewer", account: ALICE }]) },
      rateLimit: { rpm: 1, burst: 2 },
    });
    const headers = { "X-Api-Key": "viewer" };

    expect((await app.request("/api/v1/token", { headers })).status).toBe(200);
    expect((await app.request("/api/v1/token", { headers })).status).toBe(200);

    const limited = await app.request("/api/v1/token", { headers });
    expect(limited.status).toBe(429);
    expect(limited.headers.get("Retry-After")).toBe("60");
    const body = (await limited.json()) as ErrorBody;
    expect(body.error.code).toBe("RATE_LIMITED");
  });

  it("shares one budget between keys bound to the same account", async () => {
    const { app } = createTestApp({
      auth: {
        apiKeys: keyMap([
          { key: "alice-1", role: "viewer", account: ALICE },
          { key: "alice-2", role: "viewer", account: ALICE },
          { key: "bob", role: "viewer", account: BOB },
        ]),
      },
      rateLimit: { rpm: 1, burst: 2 },
    });
    const as = (key: string) => app.request("/api/v1/token", { headers: { "X-Api-Key": key } });

    expect((await as("alice-1")).status).toBe(200);
    expect((await as("alice-2")).status).toBe(200);
    expect((await as("alice-1")).status).toBe(429);
    expect((await as("bob")).status).toBe(200);
  });

  it("charges mutations the write cost", async () => {
    const { app } = createTestApp({
      auth: { apiKeys: keyMap([{ key: "admin", role: "admin", account: ALICE }]) },
      rateLimit: { rpm: 1, burst: 2, writeCost: 2 },
    });

    const mint = await app.request(
      jsonRequest("/api/v1/mint", "POST", { to: BOB, amount: "1" }, { "X-Api-Key": "admin" }),
    );
    expect(mint.status).toBe(201);
    expect(mint.headers.get("X-RateLimit-Remaining")).toBe("0");

    const read = await app.request("/api/v1/token", { headers: { "X-Api-Key": "admin" } });
    expect(read.status).toBe(429);
  });

  it("is off in unsecured mode", () => {
    const { rateLimitStore } = createTestApp({ rateLimit: { rpm: 1, burst: 1 } });
    expect(rateLimitStore).toBeUndefined();
  });
});
