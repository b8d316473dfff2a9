/**
 * @lapse/token — ExpirableToken.
 *
 * A fungible token whose balances come from an ExpiringLedger. It adds
 * what the ledger leaves out: addresses, allowances, the zero-address
 * guards and an event log. Every call reads the tick from its Clock.
 *
 * API surface:
 * - mint() / burn() — Transfer events from/to the zero address
 * - transfer() / transferAtEpoch() / transferFrom()
 * - approve() / allowance()
 * - balanceOf() and the epoch queries (currentEpoch, frame, ...)
 * - events() / subscribe() — in-memory log with synchronous dispatch
 * - startTime() / endTime() — the tick range an epoch's bucket is valid for
 *
 * A listener that throws does not undo or fail the mutation that emitted
 * the event; its error goes to the configured listener error handler.
 */

import { maxUint256 } from "viem";
import { ExpiringLedger, assertNonNegativeAmount, createTimeWindow } from "@lapse/ledger";
import type { TimeWindow, WindowConfig } from "@lapse/ledger";
import type {
  Address,
  Bucket,
  EraAndSlot,
  ExpiryType,
  Frame,
  TokenEvent,
  TokenEventBody,
} from "@lapse/types";
import { ZERO_ADDRESS } from "@lapse/types";
import { isZeroAddress, normalizeAddress } from "./address.js";
import type {
  Clock,
  ListenerErrorHandler,
  ReadEventsOptions,
  Subscription,
  TokenConfig,
  TokenEventListener,
} from "./types.js";
import { TokenError } from "./types.js";

/** An allowance of 2^256 - 1 is never spent down. */
export const INFINITE_ALLOWANCE = maxUint256;

export const DEFAULT_DECIMALS = 18;

function reportListenerError(error: unknown, event: TokenEvent): void {
  // eslint-disable-next-line no-console
  console.error(`Listener failed on token event ${String(event.sequence)}:`, error);
}

export class ExpirableToken {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly ledger: ExpiringLedger;
  /** Minting is open for ticks in `[start, end)`; undefined means always */
  readonly mintWindow: TimeWindow | undefined;
  private readonly _clock: Clock;

  /** owner → spender → allowance */
  private readonly _allowances = new Map<Address, Map<Address, bigint>>();

  private readonly _events: TokenEvent[] = [];
  private _nextSequence = 1;
  private readonly _eventLogLimit: number | undefined;
  private readonly _listeners = new Set<TokenEventListener>();
  private readonly _onListenerError: ListenerErrorHandler;

  constructor(config: TokenConfig, clock: Clock) {
    const decimals = config.decimals ?? DEFAULT_DECIMALS;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new TokenError("INVALID_AMOUNT", `Decimals must be an integer in [0, 255], got ${String(decimals)}`);
    }

    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = decimals;
    const limit = config.eventLogLimit;
    if (limit !== undefined && (!Number.isSafeInteger(limit) || limit < 1)) {
      throw new TokenError("INVALID_CONFIG", `Event log limit must be a positive integer, got ${String(limit)}`);
    }

    this.ledger = new ExpiringLedger(config.window, config.ledger);
    this.mintWindow =
      config.mintWindow === undefined
        ? undefined
        : createTimeWindow(config.mintWindow.start, config.mintWindow.end);
    this._eventLogLimit = limit;
    this._onListenerError = config.onListenerError ?? reportListenerError;
    this._clock = clock;
  }

  get windowConfig(): WindowConfig {
    return this.ledger.config;
  }

  get expiryType(): ExpiryType {
    return this.ledger.config.expiryType;
  }

  /** Current tick as reported by the clock. */
  now(): number {
    return this._clock.now();
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  mint(to: string, amount: bigint): TokenEvent {
    const receiver = normalizeAddress(to);
    if (isZeroAddress(receiver)) {
      throw new TokenError("INVALID_RECEIVER", `Cannot mint to the zero address`, { receiver });
    }
    assertUint256(amount);

    const tick = this.now();
    if (this.mintWindow !== undefined && (tick < this.mintWindow.start || tick >= this.mintWindow.end)) {
      throw new TokenError(
        "MINT_WINDOW_CLOSED",
        `Minting is open for ticks [${String(this.mintWindow.start)}, ${String(this.mintWindow.end)}), now ${String(tick)}`,
        { tick: String(tick), start: String(this.mintWindow.start), end: String(this.mintWindow.end) },
      );
    }
    this.ledger.mint(receiver, amount, tick);
    return this._emit({ type: "Transfer", from: ZERO_ADDRESS, to: receiver, value: amount }, tick);
  }

  burn(from: string, amount: bigint): TokenEvent {
    const sender = normalizeAddress(from);
    if (isZeroAddress(sender)) {
      throw new TokenError("INVALID_SENDER", `Cannot burn from the zero address`, { sender });
    }

    const tick = this.now();
    this.ledger.burn(sender, amount, tick);
    return this._emit({ type: "Transfer", from: sender, to: ZERO_ADDRESS, value: amount }, tick);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move live units, oldest first.
   */
  transfer(from: string, to: string, amount: bigint): TokenEvent {
    const [sender, receiver] = this._parties(from, to);
    const tick = this.now();
    this.ledger.transfer(sender, receiver, amount, tick);
    return this._emit({ type: "Transfer", from: sender, to: receiver, value: amount }, tick);
  }

  /**
   * Move units out of the bucket minted in `epoch` only.
   * Fails with LedgerError("SLOT_EXPIRED") once that epoch has expired.
   */
  transferAtEpoch(from: string, to: string, epoch: number, amount: bigint): TokenEvent {
    const [sender, receiver] = this._parties(from, to);
    const tick = this.now();
    this.ledger.transferAtSlot(sender, receiver, epoch, amount, tick);
    return this._emit({ type: "Transfer", from: sender, to: receiver, value: amount }, tick);
  }

  /**
   * Spend `spender`'s allowance over `from` to move units to `to`.
   * The allowance is checked first and only spent once the move succeeds.
   */
  transferFrom(spender: string, from: string, to: string, amount: bigint): TokenEvent {
    const spenderAddress = normalizeAddress(spender);
    const [sender, receiver] = this._parties(from, to);
    assertNonNegativeAmount(amount);

    const current = this._allowance(sender, spenderAddress);
    if (current !== INFINITE_ALLOWANCE && current < amount) {
      throw new TokenError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${spenderAddress} over ${sender} is ${current.toString()}, needed ${amount.toString()}`,
        { spender: spenderAddress, allowance: current.toString(), needed: amount.toString() },
      );
    }

    const tick = this.now();
    this.ledger.transfer(sender, receiver, amount, tick);
    if (current !== INFINITE_ALLOWANCE) {
      this._setAllowance(sender, spenderAddress, current - amount);
    }
    return this._emit({ type: "Transfer", from: sender, to: receiver, value: amount }, tick);
  }

  // ─── Allowances ──────────────────────────────────────────────────────

  approve(owner: string, spender: string, amount: bigint): TokenEvent {
    const ownerAddress = normalizeAddress(owner);
    const spenderAddress = normalizeAddress(spender);
    if (isZeroAddress(ownerAddress)) {
      throw new TokenError("INVALID_APPROVER", "Approver is the zero address", { approver: ownerAddress });
    }
    if (isZeroAddress(spenderAddress)) {
      throw new TokenError("INVALID_SPENDER", "Spender is the zero address", { spender: spenderAddress });
    }
    assertUint256(amount);

    this._setAllowance(ownerAddress, spenderAddress, amount);
    return this._emit(
      { type: "Approval", owner: ownerAddress, spender: spenderAddress, value: amount },
      this.now(),
    );
  }

  allowance(owner: string, spender: string): bigint {
    return this._allowance(normalizeAddress(owner), normalizeAddress(spender));
  }

  // ─── Balances ────────────────────────────────────────────────────────

  balanceOf(account: string): bigint {
    return this.ledger.balanceAt(normalizeAddress(account), this.now());
  }

  /**
   * What the bucket minted in `epoch` still holds; 0n once expired.
   */
  balanceOfAtEpoch(epoch: number, account: string): bigint {
    return this.ledger.bucketBalance(normalizeAddress(account), epoch, this.now());
  }

  balanceOfAtSlot(account: string, slot: number): bigint {
    return this.ledger.balanceAtSlot(normalizeAddress(account), slot);
  }

  /** Stored units including expired ones. */
  rawBalanceOf(account: string): bigint {
    return this.ledger.rawBalance(normalizeAddress(account));
  }

  /**
   * The account's live buckets, oldest first.
   */
  tokenList(account: string): readonly Bucket[] {
    const floor = this.ledger.window.liveFloor(this.currentEpoch());
    return this.ledger.listBuckets(normalizeAddress(account)).filter((b) => b.mintSlot >= floor);
  }

  /** Live supply; expired units are not counted. */
  totalSupply(): bigint {
    return this.ledger.liveSupplyAt(this.now());
  }

  // ─── Epochs ──────────────────────────────────────────────────────────

  currentEpoch(): number {
    return this.ledger.window.slotIndexAt(this.now());
  }

  currentEraAndSlot(): EraAndSlot {
    return this.ledger.window.eraAndSlot(this.currentEpoch());
  }

  /** Ticks per epoch. */
  epochLength(): number {
    return this.ledger.config.unitDuration;
  }

  /** Epochs a mint stays spendable. */
  validityDuration(): number {
    return this.ledger.config.validityWindowSlots;
  }

  /** Ticks a mint stays spendable. */
  validityPeriod(): number {
    return this.ledger.window.validityPeriod;
  }

  isEpochExpired(epoch: number): boolean {
    return this.ledger.window.isExpired(epoch, this.now());
  }

  frame(): Frame {
    return this.ledger.window.frame(this.currentEpoch());
  }

  /** First tick at which units minted in `epoch` count. */
  startTime(epoch: number): number {
    return this.ledger.window.bucketTimeWindow(epoch).start;
  }

  /** First tick at which units minted in `epoch` no longer count. */
  endTime(epoch: number): number {
    return this.ledger.window.bucketTimeWindow(epoch).end;
  }

  // ─── Event Log ───────────────────────────────────────────────────────

  /**
   * Events from `fromSequence` on. Once the log limit has dropped old
   * events, reads start at the oldest one still held.
   */
  events(options?: ReadEventsOptions): readonly TokenEvent[] {
    const fromSequence = options?.fromSequence ?? 1;
    const maxCount = options?.maxCount;
    const oldest = this._events[0]?.sequence ?? this._nextSequence;

    let result = this._events.slice(Math.max(0, fromSequence - oldest));
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  /** Events emitted so far, including any the log limit has dropped. */
  get eventCount(): number {
    return this._nextSequence - 1;
  }

  subscribe(listener: TokenEventListener): Subscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _parties(from: string, to: string): [Address, Address] {
    const sender = normalizeAddress(from);
    const receiver = normalizeAddress(to);
    if (isZeroAddress(sender)) {
      throw new TokenError("INVALID_SENDER", "Sender is the zero address", { sender });
    }
    if (isZeroAddress(receiver)) {
      throw new TokenError("INVALID_RECEIVER", "Receiver is the zero address", { receiver });
    }
    return [sender, receiver];
  }

  private _allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  private _setAllowance(owner: Address, spender: Address, amount: bigint): void {
    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }

  private _emit(body: TokenEventBody, tick: number): TokenEvent {
    const event: TokenEvent = { ...body, sequence: this._nextSequence, tick };
    this._nextSequence += 1;
    this._events.push(event);
    if (this._eventLogLimit !== undefined && this._events.length > this._eventLogLimit) {
      this._events.splice(0, this._events.length - this._eventLogLimit);
    }

    for (const listener of this._listeners) {
      try {
        listener(event);
      } catch (err) {
        this._onListenerError(err, event);
      }
    }
    return event;
  }
}

function assertUint256(amount: bigint): void {
  assertNonNegativeAmount(amount);
  if (amount > maxUint256) {
    throw new TokenError("INVALID_AMOUNT", `Amount exceeds 2^256 - 1: ${amount.toString()}`);
  }
}
