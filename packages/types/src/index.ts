/**
 * @lapse/types — Shared domain types for the Lapse stack.
 *
 * These types are used across all Lapse packages:
 * - Window coordinates (slots, eras, frames)
 * - Buckets of expiring units
 * - Addresses and token events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No methods that mutate state
 * - Meaning (expiry, balances) is computed by the ledger, not stored here
 */

// Window types
export type {
  ExpiryType,
  EraAndSlot,
  Frame,
  Bucket,
} from "./window.js";

// Token types
export type {
  Address,
  TransferEvent,
  ApprovalEvent,
  TokenEventBody,
  TokenEvent,
} from "./token.js";
export { ZERO_ADDRESS } from "./token.js";

// Runtime type guards
export {
  isAccountAddress,
  isExpiryType,
  isEraAndSlot,
  isBucket,
  isTokenEvent,
} from "./guards.js";
