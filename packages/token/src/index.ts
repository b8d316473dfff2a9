/**
 * @lapse/token — Expirable fungible token.
 *
 * An ERC-20 style surface over the sliding-window ledger:
 * - Zero-address guards on every party
 * - Allowances, with 2^256 - 1 treated as infinite
 * - Epoch queries over the ledger's slots
 * - An in-memory event log with subscriptions
 */

export { ExpirableToken, INFINITE_ALLOWANCE, DEFAULT_DECIMALS } from "./token.js";
export { ManualClock, SystemClock, BlockTimeClock } from "./clock.js";
export type { BlockTimeClockOptions } from "./clock.js";
export { normalizeAddress, isZeroAddress } from "./address.js";

export type {
  TokenConfig,
  Clock,
  TokenEventListener,
  ListenerErrorHandler,
  Subscription,
  ReadEventsOptions,
  TokenErrorCode,
} from "./types.js";
export { TokenError } from "./types.js";
