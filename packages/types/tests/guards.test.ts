/**
 * Runtime type guard tests for @lapse/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccountAddress,
  isExpiryType,
  isEraAndSlot,
  isBucket,
  isTokenEvent,
} from "../src/guards.js";
import { ZERO_ADDRESS } from "../src/token.js";

// EIP-55 reference vector
const CHECKSUMMED = "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed";
const LOWER = "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed";

// =============================================================================
// Address guards
// =============================================================================

describe("isAccountAddress", () => {
  it("accepts a checksummed address", () => {
    expect(isAccountAddress(CHECKSUMMED)).toBe(true);
  });

  it("accepts an all-lowercase address", () => {
    expect(isAccountAddress(LOWER)).toBe(true);
  });

  it("accepts the zero address", () => {
    expect(isAccountAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("rejects a mixed-case address with a broken checksum", () => {
    expect(isAccountAddress("0x5aAEb6053F3E94C9b9A09f33669435E7Ef1BeAed")).toBe(false);
  });

  it("rejects wrong length and missing prefix", () => {
    expect(isAccountAddress("0x1234")).toBe(false);
    expect(isAccountAddress(LOWER.slice(2))).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccountAddress(42)).toBe(false);
    expect(isAccountAddress(null)).toBe(false);
  });
});

// =============================================================================
// Window guards
// =============================================================================

describe("isExpiryType", () => {
  it("accepts both expiry types", () => {
    expect(isExpiryType("blocknumber")).toBe(true);
    expect(isExpiryType("timestamp")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isExpiryType("epoch")).toBe(false);
    expect(isExpiryType(0)).toBe(false);
  });
});

describe("isEraAndSlot", () => {
  it("accepts non-negative integers", () => {
    expect(isEraAndSlot({ era: 0, slot: 3 })).toBe(true);
  });

  it("rejects fractions and negatives", () => {
    expect(isEraAndSlot({ era: 0.5, slot: 0 })).toBe(false);
    expect(isEraAndSlot({ era: 0, slot: -1 })).toBe(false);
  });

  it("rejects missing fields", () => {
    expect(isEraAndSlot({ era: 1 })).toBe(false);
    expect(isEraAndSlot(undefined)).toBe(false);
  });
});

describe("isBucket", () => {
  it("accepts a positive bigint amount", () => {
    expect(isBucket({ mintSlot: 2, amount: 10n })).toBe(true);
  });

  it("rejects zero amounts", () => {
    expect(isBucket({ mintSlot: 2, amount: 0n })).toBe(false);
  });

  it("rejects number amounts", () => {
    expect(isBucket({ mintSlot: 2, amount: 10 })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isTokenEvent", () => {
  it("accepts a Transfer event", () => {
    expect(
      isTokenEvent({
        type: "Transfer",
        from: ZERO_ADDRESS,
        to: CHECKSUMMED,
        value: 10n,
        sequence: 1,
        tick: 100,
      }),
    ).toBe(true);
  });

  it("accepts an Approval event", () => {
    expect(
      isTokenEvent({
        type: "Approval",
        owner: CHECKSUMMED,
        spender: LOWER,
        value: 0n,
        sequence: 2,
        tick: 100,
      }),
    ).toBe(true);
  });

  it("rejects a Transfer with approval fields", () => {
    expect(
      isTokenEvent({
        type: "Transfer",
        owner: CHECKSUMMED,
        spender: LOWER,
        value: 1n,
        sequence: 1,
        tick: 0,
      }),
    ).toBe(false);
  });

  it("rejects unknown event types", () => {
    expect(
      isTokenEvent({ type: "Mint", from: ZERO_ADDRESS, to: LOWER, value: 1n, sequence: 1, tick: 0 }),
    ).toBe(false);
  });

  it("rejects negative values", () => {
    expect(
      isTokenEvent({ type: "Transfer", from: LOWER, to: LOWER, value: -1n, sequence: 1, tick: 0 }),
    ).toBe(false);
  });
});
