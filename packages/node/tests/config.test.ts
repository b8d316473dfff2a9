/**
 * Tests for config.ts — parseApiKeys, loadConfig and the token wiring.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { BlockTimeClock, SystemClock } from "@lapse/token";
import {
  clockFromConfig,
  loadConfig,
  parseApiKeys,
  tokenConfigFromConfig,
  windowFromConfig,
} from "../src/config.js";
import { ALICE, BOB } from "./setup.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries", () => {
    expect(parseApiKeys(`k1:admin:${ALICE}, k2:viewer:${BOB}`)).toEqual([
      { key: "k1", role: "admin", account: ALICE },
      { key: "k2", role: "viewer", account: BOB },
    ]);
  });

  it("checksums the bound account", () => {
    const [record] = parseApiKeys("k1:operator:0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed");
    expect(record?.account).toBe("0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed");
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:admin")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys(`a:admin:${ALICE}:x`)).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty or duplicate keys", () => {
    expect(() => parseApiKeys(`:admin:${ALICE}`)).toThrow("API key cannot be empty");
    expect(() => parseApiKeys(`k1:admin:${ALICE},k1:viewer:${BOB}`)).toThrow(
      'Duplicate API key in API_KEYS: "k1"',
    );
  });

  it("throws on invalid role or account", () => {
    expect(() => parseApiKeys(`k1:superuser:${ALICE}`)).toThrow("Invalid role");
    expect(() => parseApiKeys("k1:admin:alice")).toThrow('Invalid account "alice" in API_KEYS');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.TOKEN_DECIMALS).toBe(18);
    expect(config.EXPIRY_TYPE).toBe("blocknumber");
    expect(config.BLOCK_TIME_MS).toBe(400);
    expect(config.SLOTS_PER_ERA).toBe(4);
    expect(config.FRAME_SIZE).toBe(2);
    expect(config.TRANSFER_STAMPING).toBe("preserve");
    expect(config.PRUNE_ON_WRITE).toBe(false);
    expect(config.SLOT_DURATION).toBeUndefined();
    expect(config.RATE_LIMIT_WRITE_COST).toBe(1);
    expect(config.IDEMPOTENCY_MAX_ENTRIES).toBe(10000);
    expect(config.EVENT_LOG_LIMIT).toBe(100000);
    expect(config.MINT_WINDOW_START).toBeUndefined();
  });

  it("coerces numbers and flags", () => {
    const config = loadConfig({ PORT: "8080", PRUNE_ON_WRITE: "true", FRAME_SIZE: "8" });
    expect(config.PORT).toBe(8080);
    expect(config.PRUNE_ON_WRITE).toBe(true);
    expect(config.FRAME_SIZE).toBe(8);
  });

  it("rejects out-of-range window settings", () => {
    expect(() => loadConfig({ SLOTS_PER_ERA: "13" })).toThrow(ZodError);
    expect(() => loadConfig({ FRAME_SIZE: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ BLOCK_TIME_MS: "50" })).toThrow(ZodError);
    expect(() => loadConfig({ EXPIRY_TYPE: "epoch" })).toThrow(ZodError);
  });

  it("requires both ends of a mint window", () => {
    expect(() => loadConfig({ MINT_WINDOW_START: "100" })).toThrow(ZodError);
    expect(() => loadConfig({ MINT_WINDOW_END: "200" })).toThrow(ZodError);
  });
});

// =============================================================================
// Token wiring
// =============================================================================

describe("windowFromConfig", () => {
  it("derives block windows from the block time", () => {
    expect(windowFromConfig(loadConfig({}))).toEqual({
      unitDuration: 19_723_078,
      slotsPerEra: 4,
      validityWindowSlots: 2,
      genesisTick: 0,
      expiryType: "blocknumber",
    });
  });

  it("honours an explicit slot duration", () => {
    expect(windowFromConfig(loadConfig({ SLOT_DURATION: "100", GENESIS_TICK: "50" }))).toEqual({
      unitDuration: 100,
      slotsPerEra: 4,
      validityWindowSlots: 2,
      genesisTick: 50,
      expiryType: "blocknumber",
    });
  });

  it("splits a year into slots for timestamp windows", () => {
    expect(windowFromConfig(loadConfig({ EXPIRY_TYPE: "timestamp" }))).toEqual({
      unitDuration: 7_889_231_500,
      slotsPerEra: 4,
      validityWindowSlots: 2,
      genesisTick: 0,
      expiryType: "timestamp",
    });
  });
});

describe("tokenConfigFromConfig", () => {
  it("carries token metadata and ledger options", () => {
    const config = tokenConfigFromConfig(
      loadConfig({ TOKEN_SYMBOL: "PTS", TOKEN_DECIMALS: "6", TRANSFER_STAMPING: "restamp" }),
    );
    expect(config.symbol).toBe("PTS");
    expect(config.decimals).toBe(6);
    expect(config.ledger).toEqual({ transferStamping: "restamp", pruneOnWrite: false });
    expect(config.mintWindow).toBeUndefined();
    expect(config.eventLogLimit).toBe(100000);
  });

  it("carries the mint window and event log limit", () => {
    const config = tokenConfigFromConfig(
      loadConfig({ MINT_WINDOW_START: "100", MINT_WINDOW_END: "5000", EVENT_LOG_LIMIT: "50" }),
    );
    expect(config.mintWindow).toEqual({ start: 100, end: 5000 });
    expect(config.eventLogLimit).toBe(50);
  });
});

describe("clockFromConfig", () => {
  it("picks the clock for the expiry type", () => {
    expect(clockFromConfig(loadConfig({}))).toBeInstanceOf(BlockTimeClock);
    expect(clockFromConfig(loadConfig({ EXPIRY_TYPE: "timestamp" }))).toBeInstanceOf(SystemClock);
  });
});
