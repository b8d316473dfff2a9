/**
 * Tests for idempotency middleware.
 *
 * Verifies:
 * - A repeated Idempotency-Key replays the first response
 * - The replay does not mint twice
 * - Failed responses are not cached
 * - Keys are scoped per caller
 * - Concurrent duplicates run the request once
 * - TTL expiry and the entry cap evict cached entries
 */

import { describe, it, expect } from "vitest";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import type { BalanceView } from "../../src/types/dto.js";
import { ALICE, BOB, CAROL, createTestApp, jsonRequest } from "../setup.js";

describe("idempotency middleware", () => {
  it("replays a duplicate POST without applying it again", async () => {
    const { app } = createTestApp();
    const request = () =>
      app.request(
        jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "5" }, {
          "Idempotency-Key": "mint-1",
        }),
      );

    const first = await request();
    expect(first.status).toBe(201);
    expect(first.headers.get("X-Idempotent-Replay")).toBeNull();

    const second = await request();
    expect(second.status).toBe(201);
    expect(second.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await second.json()).toEqual(await first.json());

    const balance = await app.request(`/api/v1/accounts/${ALICE}/balance`);
    const body = (await balance.json()) as { data: BalanceView };
    expect(body.data.balance.amount).toBe("5.00");
  });

  it("runs concurrent duplicates once and replays to the later one", async () => {
    const { app } = createTestApp();
    const request = () =>
      app.request(
        jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "10" }, {
          "Idempotency-Key": "k1",
        }),
      );

    const responses = await Promise.all([request(), request()]);
    expect(responses.map((r) => r.status)).toEqual([201, 201]);
    const replays = responses.map((r) => r.headers.get("X-Idempotent-Replay"));
    expect(replays.filter((v) => v === "true")).toHaveLength(1);
    expect(replays.filter((v) => v === null)).toHaveLength(1);

    const balance = await app.request(`/api/v1/accounts/${ALICE}/balance`);
    const body = (await balance.json()) as { data: BalanceView };
    expect(body.data.balance.raw).toBe("1000");
  });

  it("does not cache a failed attempt", async () => {
    const { app } = createTestApp();
    const transfer = () =>
      app.request(
        jsonRequest("/api/v1/transfer", "POST", { to: BOB, amount: "1" }, {
          "Idempotency-Key": "transfer-1",
          "X-Account": ALICE,
        }),
      );

    expect((await transfer()).status).toBe(422);

    await app.request(jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "1" }));

    const retry = await transfer();
    expect(retry.status).toBe(200);
    expect(retry.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("scopes keys to the caller", async () => {
    const keys: ApiKeyRecord[] = [
      { key: "admin-a", role: "admin", account: ALICE },
      { key: "admin-b", role: "admin", account: CAROL },
    ];
    const { app, idempotencyStore } = createTestApp({
      auth: { apiKeys: new Map(keys.map((k) => [k.key, k])) },
    });

    for (const apiKey of ["admin-a", "admin-b"]) {
      const res = await app.request(
        jsonRequest("/api/v1/mint", "POST", { to: BOB, amount: "1" }, {
          "X-Api-Key": apiKey,
          "Idempotency-Key": "shared",
        }),
      );
      expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    }
    expect(idempotencyStore.size).toBe(2);
  });

  it("ignores the header on GET", async () => {
    const { app, idempotencyStore } = createTestApp();
    await app.request(
      jsonRequest("/api/v1/token", "GET", undefined, { "Idempotency-Key": "get-key" }),
    );
    expect(idempotencyStore.size).toBe(0);
  });
});

describe("InMemoryIdempotencyStore", () => {
  const response = { status: 200, body: "{}", headers: {} };

  it("evicts entries older than the TTL", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore({ ttlMs: 1_000, now: () => now });
    store.set("k", response);

    now = 1_000;
    expect(store.get("k")).toEqual(response);

    now = 1_001;
    expect(store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("drops the oldest entry once the cap is reached", () => {
    const store = new InMemoryIdempotencyStore({ maxEntries: 2, now: () => 0 });
    store.set("a", response);
    store.set("b", response);
    store.set("c", response);

    expect(store.size).toBe(2);
    expect(store.get("a")).toBeUndefined();
    expect(store.get("b")).toEqual(response);
    expect(store.get("c")).toEqual(response);
  });

  it("makes room by evicting expired entries first", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore({ ttlMs: 1_000, maxEntries: 2, now: () => now });
    store.set("a", response);
    now = 500;
    store.set("b", response);
    now = 1_200;
    store.set("c", response);

    expect(store.size).toBe(2);
    expect(store.get("b")).toEqual(response);
    expect(store.get("c")).toEqual(response);
  });

  it("sweeps expired entries on demand", () => {
    let now = 0;
    const store = new InMemoryIdempotencyStore({ ttlMs: 1_000, now: () => now });
    store.set("a", response);
    store.set("b", response);
    now = 2_000;
    store.set("c", response);

    expect(store.evictExpired()).toBe(2);
    expect(store.size).toBe(1);
  });
});
