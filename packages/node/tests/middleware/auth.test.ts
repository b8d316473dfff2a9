/**
 * Tests for authentication and permissions.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - Role permissions on mint and transfer
 * - The bound account acts, whatever X-Account says
 */

import { describe, it, expect } from "vitest";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { hasPermission } from "../../src/types/auth.js";
import type { BalanceView } from "../../src/types/dto.js";
import { ALICE, BOB, CAROL, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";

const KEYS: readonly ApiKeyRecord[] = [
  { key: "admin-key", role: "admin", account: CAROL },
  { key: "operator-key", role: "operator", account: ALICE },
  { key: "viewer-key", role: "viewer", account: BOB },
];

function securedApp() {
  return createTestApp({
    auth: { apiKeys: new Map(KEYS.map((k) => [k.key, k])) },
  });
}

function withKey(key: string, extra: Record<string, string> = {}): Record<string, string> {
  return { "X-Api-Key": key, ...extra };
}

describe("role permissions", () => {
  it("grows from viewer to admin", () => {
    expect(hasPermission("viewer", "read")).toBe(true);
    expect(hasPermission("viewer", "write")).toBe(false);
    expect(hasPermission("operator", "write")).toBe(true);
    expect(hasPermission("operator", "admin")).toBe(false);
    expect(hasPermission("admin", "admin")).toBe(true);
  });
});

describe("API key auth", () => {
  it("requires a key on /api/*", async () => {
    const { app } = securedApp();
    const res = await app.request("/api/v1/token");

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects an unknown key", async () => {
    const { app } = securedApp();
    const res = await app.request("/api/v1/token", { headers: withKey("nope") });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid API key");
  });

  it("leaves health unauthenticated", async () => {
    const { app } = securedApp();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });

  it("lets a viewer read", async () => {
    const { app } = securedApp();
    const res = await app.request("/api/v1/token", { headers: withKey("viewer-key") });
    expect(res.status).toBe(200);
  });
});

describe("permission guard", () => {
  it("forbids an operator from minting", async () => {
    const { app } = securedApp();
    const res = await app.request(
      jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "1" }, withKey("operator-key")),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "FORBIDDEN",
      message: "Role 'operator' lacks 'admin' permission",
    });
  });

  it("forbids a viewer from transferring", async () => {
    const { app } = securedApp();
    const res = await app.request(
      jsonRequest("/api/v1/transfer", "POST", { to: ALICE, amount: "1" }, withKey("viewer-key")),
    );
    expect(res.status).toBe(403);
  });

  it("transfers from the key's bound account", async () => {
    const { app } = securedApp();
    const minted = await app.request(
      jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "5" }, withKey("admin-key")),
    );
    expect(minted.status).toBe(201);

    const res = await app.request(
      jsonRequest(
        "/api/v1/transfer",
        "POST",
        { to: BOB, amount: "2" },
        withKey("operator-key", { "X-Account": CAROL }),
      ),
    );
    expect(res.status).toBe(200);

    const balance = await app.request(`/api/v1/accounts/${ALICE}/balance`, {
      headers: withKey("viewer-key"),
    });
    const body = (await balance.json()) as { data: BalanceView };
    expect(body.data.balance.amount).toBe("3.00");
  });
});
