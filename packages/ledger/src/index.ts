/**
 * @lapse/ledger — Sliding-window expiring balance ledger.
 *
 * A pure TypeScript ledger with no I/O.
 * Enforces the expiry invariants:
 * - Units are binned by the slot they were minted in
 * - A bucket is spendable while currentSlot < mintSlot + validityWindowSlots
 * - Expiry is computed on read, never swept
 * - Debits consume live buckets oldest first, all or nothing
 * - All amount arithmetic uses bigint (no floating point)
 */

// Core engine
export { ExpiringLedger } from "./ledger.js";

// Window arithmetic
export {
  SlidingWindow,
  createWindowConfig,
  createTimeWindow,
  windowConfigFromBlockTime,
  MINIMUM_SLOTS_PER_ERA,
  MAXIMUM_SLOTS_PER_ERA,
  MINIMUM_FRAME_SIZE,
  MAXIMUM_FRAME_SIZE,
  MINIMUM_BLOCK_TIME_MS,
  MAXIMUM_BLOCK_TIME_MS,
  YEAR_IN_MILLISECONDS,
} from "./window.js";

// Bucket storage
export { BucketLedger } from "./bucket-ledger.js";

// Balance computation
export {
  liveFloor,
  sumLiveBuckets,
  sumBucketsAsOf,
  sumAllBuckets,
} from "./balance-calculator.js";

// Unit selection
export { planDebit } from "./consumption.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  assertNonNegativeAmount,
  assertPositiveAmount,
} from "./amount-math.js";

// Types
export type {
  WindowConfig,
  WindowConfigInput,
  TimeWindow,
  TransferStamping,
  LedgerOptions,
  ResolvedLedgerOptions,
  BucketMovement,
  TransferResult,
  LedgerErrorCode,
  BucketSnapshot,
  AccountSnapshot,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError, TRANSFER_STAMPING_MODES } from "./types.js";

// Snapshot validation
export { parseLedgerSnapshot } from "./snapshot.js";
