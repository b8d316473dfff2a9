/**
 * @lapse/ledger — Core ExpiringLedger class.
 *
 * Sliding-window balance ledger. Minted units land in the bucket of the
 * slot they were minted in and stop counting once that slot falls out
 * of the validity window. Expiry is computed on read; nothing sweeps.
 *
 * API surface:
 * - mint() — Credit a fresh bucket stamped with the current slot
 * - burn() — Debit live buckets, oldest first
 * - transfer() — Debit one account, credit another
 * - transferAtSlot() — Move units out of one named bucket
 * - balanceAt() / balanceAtSlot() / bucketBalance() — Expiry-aware reads
 * - prune() — Optional garbage collection of expired buckets
 * - snapshot() / fromSnapshot() — Serialize and restore
 *
 * Every mutation validates fully before touching a bucket, so a failed
 * call leaves the ledger exactly as it was. Calls are synchronous and
 * run to completion, which serializes mutations per ledger instance.
 */

import type { Bucket } from "@lapse/types";
import { assertNonNegativeAmount } from "./amount-math.js";
import {
  liveFloor,
  sumAllBuckets,
  sumBucketsAsOf,
  sumLiveBuckets,
} from "./balance-calculator.js";
import { BucketLedger } from "./bucket-ledger.js";
import { planDebit } from "./consumption.js";
import { parseLedgerSnapshot } from "./snapshot.js";
import { SlidingWindow } from "./window.js";
import type {
  AccountSnapshot,
  BucketMovement,
  LedgerOptions,
  LedgerSnapshot,
  ResolvedLedgerOptions,
  TransferResult,
  WindowConfig,
  WindowConfigInput,
} from "./types.js";
import { LedgerError, TRANSFER_STAMPING_MODES } from "./types.js";

export class ExpiringLedger {
  readonly window: SlidingWindow;
  readonly options: ResolvedLedgerOptions;
  private readonly _buckets = new BucketLedger();

  constructor(config: WindowConfigInput, options?: LedgerOptions) {
    this.window = new SlidingWindow(config);

    const transferStamping = options?.transferStamping ?? "preserve";
    if (!TRANSFER_STAMPING_MODES.includes(transferStamping)) {
      throw new LedgerError("INVALID_OPTIONS", `Unknown transfer stamping: ${String(transferStamping)}`);
    }
    this.options = {
      transferStamping,
      pruneOnWrite: options?.pruneOnWrite ?? false,
    };
  }

  get config(): WindowConfig {
    return this.window.config;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Credit `amount` to `account`, stamped with the slot of `tick`.
   */
  mint(account: string, amount: bigint, tick: number): BucketMovement {
    const mintSlot = this.window.slotIndexAt(tick);
    this._buckets.recordMint(account, amount, mintSlot);
    return { mintSlot, amount };
  }

  /**
   * Destroy `amount` of the account's live units, oldest first.
   */
  burn(account: string, amount: bigint, tick: number): readonly BucketMovement[] {
    const currentSlot = this.window.slotIndexAt(tick);
    const debits = planDebit(
      account,
      this._buckets.listBuckets(account),
      amount,
      currentSlot,
      this.window.validityWindowSlots,
    );
    this._applyDebits(account, debits, currentSlot);
    return debits;
  }

  /**
   * Move `amount` of live units from `from` to `to`, oldest first.
   */
  transfer(from: string, to: string, amount: bigint, tick: number): TransferResult {
    const currentSlot = this.window.slotIndexAt(tick);
    const debits = planDebit(
      from,
      this._buckets.listBuckets(from),
      amount,
      currentSlot,
      this.window.validityWindowSlots,
    );
    this._applyDebits(from, debits, currentSlot);
    const credits = this._applyCredits(to, debits, currentSlot);
    return { debits, credits };
  }

  /**
   * Move `amount` out of the sender's bucket for `mintSlot` only.
   */
  transferAtSlot(
    from: string,
    to: string,
    mintSlot: number,
    amount: bigint,
    tick: number,
  ): TransferResult {
    assertNonNegativeAmount(amount);
    const currentSlot = this.window.slotIndexAt(tick);

    if (this.window.isSlotExpired(mintSlot, currentSlot)) {
      throw new LedgerError(
        "SLOT_EXPIRED",
        `Slot ${String(mintSlot)} expired at slot ${String(this.window.expirySlotIndex(mintSlot))}`,
        { mintSlot: String(mintSlot), currentSlot: String(currentSlot) },
      );
    }

    const held = this._buckets.bucketAmount(from, mintSlot);
    if (held < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for "${from}" in slot ${String(mintSlot)}: available ${held.toString()}, requested ${amount.toString()}`,
        { account: from, available: held.toString(), requested: amount.toString() },
      );
    }

    const debits: readonly BucketMovement[] = amount > 0n ? [{ mintSlot, amount }] : [];
    this._applyDebits(from, debits, currentSlot);
    const credits = this._applyCredits(to, debits, currentSlot);
    return { debits, credits };
  }

  private _applyDebits(
    account: string,
    debits: readonly BucketMovement[],
    currentSlot: number,
  ): void {
    for (const debit of debits) {
      this._buckets.removeOrDecrement(account, debit.mintSlot, debit.amount);
    }
    if (this.options.pruneOnWrite) {
      this._buckets.prune(account, liveFloor(currentSlot, this.window.validityWindowSlots));
    }
  }

  private _applyCredits(
    account: string,
    debits: readonly BucketMovement[],
    currentSlot: number,
  ): readonly BucketMovement[] {
    if (this.options.transferStamping === "preserve") {
      for (const debit of debits) {
        this._buckets.recordMint(account, debit.amount, debit.mintSlot);
      }
      return debits;
    }

    const total = debits.reduce((acc, d) => acc + d.amount, 0n);
    if (total === 0n) {
      return [];
    }
    this._buckets.recordMint(account, total, currentSlot);
    return [{ mintSlot: currentSlot, amount: total }];
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * Spendable balance at `tick`.
   */
  balanceAt(account: string, tick: number): bigint {
    return sumLiveBuckets(
      this._buckets.listBuckets(account),
      this.window.slotIndexAt(tick),
      this.window.validityWindowSlots,
    );
  }

  /**
   * Balance as of a past slot, applying the expiry rule relative to
   * that slot. Amounts are what the buckets hold now.
   */
  balanceAtSlot(account: string, slotIndex: number): bigint {
    // validates the slot index
    this.window.liveFloor(slotIndex);
    return sumBucketsAsOf(
      this._buckets.listBuckets(account),
      slotIndex,
      this.window.validityWindowSlots,
    );
  }

  /**
   * What one bucket holds at `tick`; 0n once it has expired.
   */
  bucketBalance(account: string, mintSlot: number, tick: number): bigint {
    if (this.window.isExpired(mintSlot, tick)) {
      return 0n;
    }
    return this._buckets.bucketAmount(account, mintSlot);
  }

  /**
   * Sum of every bucket the account still stores, expired or not.
   */
  rawBalance(account: string): bigint {
    return this._buckets.rawBalance(account);
  }

  listBuckets(account: string): readonly Bucket[] {
    return this._buckets.listBuckets(account);
  }

  accounts(): readonly string[] {
    return this._buckets.accounts();
  }

  /**
   * Sum of every account's spendable balance at `tick`.
   */
  liveSupplyAt(tick: number): bigint {
    const currentSlot = this.window.slotIndexAt(tick);
    let total = 0n;
    for (const account of this._buckets.accounts()) {
      total += sumLiveBuckets(
        this._buckets.listBuckets(account),
        currentSlot,
        this.window.validityWindowSlots,
      );
    }
    return total;
  }

  // ─── Garbage Collection ──────────────────────────────────────────────

  /**
   * Physically drop every expired bucket. Balances are unchanged;
   * raw balances shrink. Returns the total amount dropped.
   */
  prune(tick: number): bigint {
    const floor = this.window.liveFloor(this.window.slotIndexAt(tick));
    let dropped = 0n;
    for (const account of this._buckets.accounts()) {
      dropped += this._buckets.prune(account, floor);
    }
    return dropped;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with ExpiringLedger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    const accounts: AccountSnapshot[] = this._buckets.accounts().map((account) => ({
      account,
      buckets: this._buckets.listBuckets(account).map((b) => ({
        mintSlot: b.mintSlot,
        amount: b.amount.toString(),
      })),
    }));

    return {
      version: 1,
      config: this.window.config,
      options: this.options,
      accounts,
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot. The snapshot is validated in full
   * before any bucket is written.
   */
  static fromSnapshot(snapshot: unknown): ExpiringLedger {
    const parsed = parseLedgerSnapshot(snapshot);
    const ledger = new ExpiringLedger(parsed.config, parsed.options);

    for (const account of parsed.accounts) {
      for (const bucket of account.buckets) {
        ledger._buckets.recordMint(account.account, BigInt(bucket.amount), bucket.mintSlot);
      }
    }

    return ledger;
  }

  /**
   * Sum of every stored bucket across all accounts, expired or not.
   */
  get rawSupply(): bigint {
    let total = 0n;
    for (const account of this._buckets.accounts()) {
      total += sumAllBuckets(this._buckets.listBuckets(account));
    }
    return total;
  }
}
