/**
 * Token Types
 *
 * Addresses and the events a token emits.
 *
 * Rules:
 * - Addresses are EIP-55 checksummed once they pass the token boundary
 * - Mints and burns are transfers from/to the zero address
 */

import type { Address } from "viem";

export type { Address };

/** The zero address used as counterparty for mints and burns. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Units moved between two accounts.
 */
export interface TransferEvent {
  readonly type: "Transfer";
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
}

/**
 * An owner set a spender's allowance.
 */
export interface ApprovalEvent {
  readonly type: "Approval";
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
}

export type TokenEventBody = TransferEvent | ApprovalEvent;

/**
 * An event as recorded in a token's log.
 */
export type TokenEvent = TokenEventBody & {
  /** Position in the log (1-based, monotonically increasing) */
  readonly sequence: number;

  /** Tick at which the event happened */
  readonly tick: number;
};
