/**
 * Tests for TokenService — logging, metrics and views.
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { ExpirableToken, ManualClock } from "@lapse/token";
import { ZERO_ADDRESS } from "@lapse/types";
import { MetricsCollector } from "../src/middleware/metrics.js";
import {
  OPERATIONS_METRIC,
  REJECTIONS_METRIC,
  TokenService,
} from "../src/services/token-service.js";
import { ALICE, BOB, TEST_WINDOW } from "./setup.js";

function makeService() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  );
  const clock = new ManualClock();
  const token = new ExpirableToken(
    { name: "Test Points", symbol: "TPT", decimals: 2, window: TEST_WINDOW },
    clock,
  );
  const metrics = new MetricsCollector();
  const service = new TokenService({ token, logger, metrics });
  return { service, clock, lines, metrics };
}

describe("TokenService", () => {
  it("logs each applied mutation once", () => {
    const { service, lines } = makeService();
    service.mint(ALICE, "2");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      component: "token-service",
      operation: "mint",
      msg: "token mutation applied",
      event: {
        sequence: 1,
        type: "Transfer",
        from: ZERO_ADDRESS,
        to: ALICE,
        value: { amount: "2.00", raw: "200" },
      },
    });
  });

  it("logs and counts a rejection, then rethrows it", () => {
    const { service, lines, metrics } = makeService();

    expect(() => service.burn(ALICE, "1")).toThrow("Insufficient balance");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      operation: "burn",
      code: "INSUFFICIENT_BALANCE",
      msg: "token mutation rejected",
    });
    expect(
      metrics.counterValue(REJECTIONS_METRIC, { operation: "burn", code: "INSUFFICIENT_BALANCE" }),
    ).toBe(1);
    expect(metrics.counterValue(OPERATIONS_METRIC, { operation: "burn" })).toBe(0);
  });

  it("renders events from the token log", () => {
    const { service } = makeService();
    service.mint(ALICE, "3");
    service.approve(ALICE, BOB, "1.5");

    expect(service.events()).toEqual([
      {
        sequence: 1,
        tick: 0,
        type: "Transfer",
        from: ZERO_ADDRESS,
        to: ALICE,
        value: { amount: "3.00", raw: "300" },
      },
      {
        sequence: 2,
        tick: 0,
        type: "Approval",
        owner: ALICE,
        spender: BOB,
        value: { amount: "1.50", raw: "150" },
      },
    ]);
  });

  it("is ready from the genesis tick on", () => {
    const { service, clock } = makeService();
    expect(service.isReady()).toBe(true);
    clock.advance(1_000);
    expect(service.isReady()).toBe(true);
  });
});
