/**
 * @lapse/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @lapse/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { ExpiryType } from "@lapse/types";

// ─── Window Configuration ────────────────────────────────────────────────

/**
 * Validated, immutable window configuration.
 */
export interface WindowConfig {
  /** Ticks per slot */
  readonly unitDuration: number;
  /** Slots per era */
  readonly slotsPerEra: number;
  /** Slots a bucket stays spendable, counted from its mint slot */
  readonly validityWindowSlots: number;
  /** Tick at which slot 0 begins */
  readonly genesisTick: number;
  /** What a tick counts */
  readonly expiryType: ExpiryType;
}

/**
 * Window configuration as supplied by callers; defaults fill the rest.
 */
export interface WindowConfigInput {
  readonly unitDuration: number;
  readonly slotsPerEra: number;
  readonly validityWindowSlots: number;
  readonly genesisTick?: number | undefined;
  readonly expiryType?: ExpiryType | undefined;
}

/**
 * Half-open tick range `[start, end)`.
 */
export interface TimeWindow {
  readonly start: number;
  readonly end: number;
}

// ─── Ledger Options ──────────────────────────────────────────────────────

/**
 * How a transfer stamps the units it credits.
 *
 * - "preserve": the receiver's bucket keeps the sender's mint slot,
 *   so the expiry countdown survives the transfer
 * - "restamp": the receiver's units are stamped with the current slot
 */
export type TransferStamping = "preserve" | "restamp";

export const TRANSFER_STAMPING_MODES: readonly TransferStamping[] = ["preserve", "restamp"];

export interface LedgerOptions {
  readonly transferStamping?: TransferStamping | undefined;
  /** Drop the debited account's expired buckets after every debit. */
  readonly pruneOnWrite?: boolean | undefined;
}

export interface ResolvedLedgerOptions {
  readonly transferStamping: TransferStamping;
  readonly pruneOnWrite: boolean;
}

// ─── Movements ───────────────────────────────────────────────────────────

/**
 * Units taken from or added to one bucket.
 */
export interface BucketMovement {
  readonly mintSlot: number;
  readonly amount: bigint;
}

/**
 * Result of a transfer: what left the sender, what reached the receiver.
 */
export interface TransferResult {
  readonly debits: readonly BucketMovement[];
  readonly credits: readonly BucketMovement[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_TIME_WINDOW"
  | "INVALID_BLOCK_TIME"
  | "INVALID_TICK"
  | "INVALID_SLOT"
  | "SLOT_OVERFLOW"
  | "SLOT_EXPIRED"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_BUCKET_AMOUNT"
  | "INVALID_OPTIONS"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown; no operation reports failure through its return value.
 *
 * `details` holds string values only so it can be put on the wire as is.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, string>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface BucketSnapshot {
  readonly mintSlot: number;
  /** Base units as a decimal integer string */
  readonly amount: string;
}

export interface AccountSnapshot {
  readonly account: string;
  readonly buckets: readonly BucketSnapshot[];
}

/**
 * Serializable snapshot of the entire ledger state.
 * Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly config: WindowConfig;
  readonly options: ResolvedLedgerOptions;
  readonly accounts: readonly AccountSnapshot[];
  readonly createdAt: string;
}
