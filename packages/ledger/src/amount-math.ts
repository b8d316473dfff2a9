/**
 * @lapse/ledger — Deterministic amount arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative
 * - Amounts must be valid decimal strings
 */

import { LedgerError } from "./types.js";

/**
 * Parse a decimal string amount into base units scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  assertDecimals(decimals);

  const trimmed = amount.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Convert base units back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 */
export function formatAmount(units: bigint, decimals: number): string {
  assertDecimals(decimals);
  assertNonNegativeAmount(units);

  if (decimals === 0) {
    return units.toString();
  }

  const str = units.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/**
 * Throw unless the amount is zero or more.
 */
export function assertNonNegativeAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative, got ${amount.toString()}`);
  }
}

/**
 * Throw unless the amount is strictly positive.
 */
export function assertPositiveAmount(amount: bigint): void {
  if (amount <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
  }
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new LedgerError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got ${String(decimals)}`);
  }
}
