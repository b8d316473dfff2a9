/**
 * TokenService — Composition root for the token and its ledger.
 *
 * Route handlers delegate to this service; they never touch the
 * ExpirableToken directly. The service parses decimal amounts, renders
 * views with formatted and raw amounts, logs each mutation and counts
 * it in the metrics collector.
 */

import type { Logger } from "pino";
import { formatAmount, parseAmount } from "@lapse/ledger";
import { INFINITE_ALLOWANCE, normalizeAddress } from "@lapse/token";
import type { ExpirableToken, ReadEventsOptions } from "@lapse/token";
import type { TokenEvent } from "@lapse/types";
import type { MetricsCollector } from "../middleware/metrics.js";
import type {
  AllowanceView,
  AmountView,
  BalanceView,
  BucketsView,
  EventView,
  TokenInfoView,
  WindowView,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export const OPERATIONS_METRIC = "lapse_token_operations_total";
export const REJECTIONS_METRIC = "lapse_token_rejections_total";

export type TokenOperation = "mint" | "burn" | "transfer" | "approve" | "transfer_from";

export interface TokenServiceOptions {
  readonly token: ExpirableToken;
  readonly logger: Logger;
  readonly metrics?: MetricsCollector | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class TokenService {
  readonly token: ExpirableToken;
  private readonly _log: Logger;
  private readonly _metrics: MetricsCollector | undefined;

  constructor(options: TokenServiceOptions) {
    this.token = options.token;
    this._log = options.logger.child({ component: "token-service" });
    this._metrics = options.metrics;

    this._metrics?.describeCounter(OPERATIONS_METRIC, "Token mutations applied, by operation");
    this._metrics?.describeCounter(REJECTIONS_METRIC, "Token mutations rejected, by operation and error code");
  }

  // ─── Mutations ─────────────────────────────────────────────────────

  mint(to: string, amount: string): EventView {
    return this._mutate("mint", () => this.token.mint(to, this._parse(amount)));
  }

  burn(from: string, amount: string): EventView {
    return this._mutate("burn", () => this.token.burn(from, this._parse(amount)));
  }

  /**
   * Oldest-first transfer, or a transfer out of one epoch's bucket when
   * `epoch` is given.
   */
  transfer(from: string, to: string, amount: string, epoch?: number): EventView {
    return this._mutate("transfer", () =>
      epoch === undefined
        ? this.token.transfer(from, to, this._parse(amount))
        : this.token.transferAtEpoch(from, to, epoch, this._parse(amount)),
    );
  }

  /** `"max"` grants an allowance that is never spent down. */
  approve(owner: string, spender: string, amount: string): EventView {
    return this._mutate("approve", () =>
      this.token.approve(
        owner,
        spender,
        amount === "max" ? INFINITE_ALLOWANCE : this._parse(amount),
      ),
    );
  }

  transferFrom(spender: string, from: string, to: string, amount: string): EventView {
    return this._mutate("transfer_from", () =>
      this.token.transferFrom(spender, from, to, this._parse(amount)),
    );
  }

  // ─── Queries ───────────────────────────────────────────────────────

  info(): TokenInfoView {
    const config = this.token.windowConfig;
    return {
      name: this.token.name,
      symbol: this.token.symbol,
      decimals: this.token.decimals,
      expiryType: config.expiryType,
      window: {
        unitDuration: config.unitDuration,
        slotsPerEra: config.slotsPerEra,
        validityWindowSlots: config.validityWindowSlots,
        genesisTick: config.genesisTick,
        validityPeriod: this.token.validityPeriod(),
      },
      mintWindow: this.token.mintWindow ?? null,
      totalSupply: this.amountView(this.token.totalSupply()),
    };
  }

  window(): WindowView {
    const tick = this.token.now();
    const epoch = this.token.ledger.window.slotIndexAt(tick);
    const { era, slot } = this.token.ledger.window.eraAndSlot(epoch);
    return { tick, epoch, era, slot, frame: this.token.ledger.window.frame(epoch) };
  }

  /**
   * Live balance now, or as of `slot` when given.
   */
  balance(address: string, slot?: number): BalanceView {
    const account = normalizeAddress(address);
    if (slot === undefined) {
      return { address: account, balance: this.amountView(this.token.balanceOf(account)) };
    }
    return {
      address: account,
      slot,
      balance: this.amountView(this.token.balanceOfAtSlot(account, slot)),
    };
  }

  /**
   * Every stored bucket, expired ones included and flagged.
   */
  buckets(address: string): BucketsView {
    const account = normalizeAddress(address);
    const window = this.token.ledger.window;
    const currentEpoch = this.token.currentEpoch();

    return {
      address: account,
      currentEpoch,
      buckets: this.token.ledger.listBuckets(account).map((bucket) => {
        const { era, slot } = window.eraAndSlot(bucket.mintSlot);
        const validity = window.bucketTimeWindow(bucket.mintSlot);
        return {
          mintSlot: bucket.mintSlot,
          era,
          slot,
          expiresAtSlot: window.expirySlotIndex(bucket.mintSlot),
          startTick: validity.start,
          endTick: validity.end,
          expired: window.isSlotExpired(bucket.mintSlot, currentEpoch),
          amount: this.amountView(bucket.amount),
        };
      }),
    };
  }

  allowance(owner: string, spender: string): AllowanceView {
    const ownerAddress = normalizeAddress(owner);
    const spenderAddress = normalizeAddress(spender);
    const value = this.token.allowance(ownerAddress, spenderAddress);
    return {
      owner: ownerAddress,
      spender: spenderAddress,
      allowance: this.amountView(value),
      infinite: value === INFINITE_ALLOWANCE,
    };
  }

  events(options?: ReadEventsOptions): readonly EventView[] {
    return this.token.events(options).map((event) => this.eventView(event));
  }

  /**
   * Ready once the clock has reached the window genesis.
   */
  isReady(): boolean {
    return this.token.now() >= this.token.windowConfig.genesisTick;
  }

  // ─── Views ─────────────────────────────────────────────────────────

  amountView(units: bigint): AmountView {
    return { amount: formatAmount(units, this.token.decimals), raw: units.toString() };
  }

  eventView(event: TokenEvent): EventView {
    const base = { sequence: event.sequence, tick: event.tick, value: this.amountView(event.value) };
    if (event.type === "Transfer") {
      return { ...base, type: "Transfer", from: event.from, to: event.to };
    }
    return { ...base, type: "Approval", owner: event.owner, spender: event.spender };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _parse(amount: string): bigint {
    return parseAmount(amount, this.token.decimals);
  }

  private _mutate(operation: TokenOperation, apply: () => TokenEvent): EventView {
    let event: TokenEvent;
    try {
      event = apply();
    } catch (err) {
      const code = errorCode(err);
      this._metrics?.incrementCounter(REJECTIONS_METRIC, { operation, code });
      this._log.debug({ operation, code }, "token mutation rejected");
      throw err;
    }

    this._metrics?.incrementCounter(OPERATIONS_METRIC, { operation });
    const view = this.eventView(event);
    this._log.info({ operation, event: view }, "token mutation applied");
    return view;
  }
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}
