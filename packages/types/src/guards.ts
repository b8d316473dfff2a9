/**
 * Runtime Type Guards
 *
 * Narrowing functions for Lapse domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, external integrations).
 */

import { isAddress } from "viem";
import type { Address, TokenEvent } from "./token.js";
import type { Bucket, EraAndSlot, ExpiryType } from "./window.js";

// =============================================================================
// Address guards
// =============================================================================

/**
 * Accepts any well-formed 20-byte hex address. All-lowercase input
 * passes; any other casing must carry a valid EIP-55 checksum.
 */
export function isAccountAddress(value: unknown): value is Address {
  return typeof value === "string" && isAddress(value);
}

// =============================================================================
// Window guards
// =============================================================================

const EXPIRY_TYPES = new Set<string>(["blocknumber", "timestamp"]);

function isSlotNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isExpiryType(value: unknown): value is ExpiryType {
  return typeof value === "string" && EXPIRY_TYPES.has(value);
}

export function isEraAndSlot(value: unknown): value is EraAndSlot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isSlotNumber(v.era) && isSlotNumber(v.slot);
}

export function isBucket(value: unknown): value is Bucket {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isSlotNumber(v.mintSlot) && typeof v.amount === "bigint" && v.amount > 0n;
}

// =============================================================================
// Event guards
// =============================================================================

export function isTokenEvent(value: unknown): value is TokenEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isSlotNumber(v.sequence) || !isSlotNumber(v.tick)) return false;
  if (typeof v.value !== "bigint" || v.value < 0n) return false;

  if (v.type === "Transfer") {
    return isAccountAddress(v.from) && isAccountAddress(v.to);
  }
  if (v.type === "Approval") {
    return isAccountAddress(v.owner) && isAccountAddress(v.spender);
  }
  return false;
}
