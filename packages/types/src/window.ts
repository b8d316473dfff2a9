/**
 * Window Types
 *
 * Time-window coordinates shared by the ledger, the token and the service.
 *
 * Rules:
 * - Slot indexes are flat and monotonic from the window's genesis tick
 * - Era/slot pairs are a display decomposition of a slot index
 * - Amounts are bigint base units, never floating point
 */

/**
 * What a tick counts.
 *
 * - "blocknumber": block heights
 * - "timestamp": milliseconds
 */
export type ExpiryType = "blocknumber" | "timestamp";

/**
 * A slot index split into era and slot-within-era.
 */
export interface EraAndSlot {
  readonly era: number;
  readonly slot: number;
}

/**
 * A contiguous range of slots, inclusive at both ends.
 */
export interface Frame {
  readonly fromEra: number;
  readonly fromSlot: number;
  readonly toEra: number;
  readonly toSlot: number;
}

/**
 * Per-account, per-mint-slot aggregate amount.
 */
export interface Bucket {
  /** Slot index the units were minted in */
  readonly mintSlot: number;

  /** Remaining base units in this bucket (always > 0 when stored) */
  readonly amount: bigint;
}
