/**
 * @lapse/token — Types for the expirable token.
 *
 * Rules:
 * - Addresses cross the token boundary checksummed
 * - Amounts are bigint base units
 * - Failures throw; nothing returns an error code
 */

import type { LedgerOptions, TimeWindow, WindowConfigInput } from "@lapse/ledger";
import type { TokenEvent } from "@lapse/types";

// ─── Configuration ───────────────────────────────────────────────────────

export interface TokenConfig {
  readonly name: string;
  readonly symbol: string;
  /** Display decimals; defaults to 18 */
  readonly decimals?: number | undefined;
  readonly window: WindowConfigInput;
  readonly ledger?: LedgerOptions | undefined;
  /** Ticks `[start, end)` during which minting is open; always open when absent */
  readonly mintWindow?: TimeWindow | undefined;
  /** Most events kept in memory; the oldest are dropped first */
  readonly eventLogLimit?: number | undefined;
  /** Receives errors thrown by event listeners */
  readonly onListenerError?: ListenerErrorHandler | undefined;
}

// ─── Clock ───────────────────────────────────────────────────────────────

/**
 * Source of the current tick: a block height or a millisecond timestamp,
 * matching the window's expiry type.
 */
export interface Clock {
  now(): number;
}

// ─── Events ──────────────────────────────────────────────────────────────

export type TokenEventListener = (event: TokenEvent) => void;

/**
 * A listener runs after its mutation has been applied, so its failure
 * is reported here rather than thrown to the caller of the mutation.
 */
export type ListenerErrorHandler = (error: unknown, event: TokenEvent) => void;

/**
 * A subscription that can be cancelled.
 */
export interface Subscription {
  unsubscribe(): void;
}

export interface ReadEventsOptions {
  /** First sequence number to return (default: 1) */
  readonly fromSequence?: number | undefined;
  /** Maximum number of events to return */
  readonly maxCount?: number | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type TokenErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INVALID_TICK"
  | "INVALID_SENDER"
  | "INVALID_RECEIVER"
  | "INVALID_APPROVER"
  | "INVALID_SPENDER"
  | "INVALID_CONFIG"
  | "MINT_WINDOW_CLOSED"
  | "INSUFFICIENT_ALLOWANCE";

/**
 * Structured error from the token layer. Ledger failures (balance,
 * expiry, window) surface as LedgerError.
 */
export class TokenError extends Error {
  public readonly code: TokenErrorCode;
  public readonly details: Readonly<Record<string, string>> | undefined;

  constructor(
    code: TokenErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = "TokenError";
    this.code = code;
    this.details = details;
  }
}
