/**
 * @lapse/ledger — Per-account bucket storage.
 *
 * Stores every account's buckets keyed by mint slot, kept in ascending
 * slot order so consumption can walk them oldest first.
 *
 * Rules:
 * - Stored buckets always hold a positive amount
 * - A bucket is removed the moment it reaches zero
 * - Expiry is not this layer's concern; it only stores and retrieves
 */

import type { Bucket } from "@lapse/types";
import { assertPositiveAmount } from "./amount-math.js";
import { LedgerError } from "./types.js";

interface MutableBucket {
  readonly mintSlot: number;
  amount: bigint;
}

interface AccountBuckets {
  /** Sorted by mintSlot, ascending */
  readonly buckets: MutableBucket[];
  total: bigint;
}

/**
 * Index of the first bucket whose mintSlot is >= `mintSlot`.
 */
function lowerBound(buckets: readonly MutableBucket[], mintSlot: number): number {
  let lo = 0;
  let hi = buckets.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const bucket = buckets[mid];
    if (bucket !== undefined && bucket.mintSlot < mintSlot) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export class BucketLedger {
  private readonly _accounts = new Map<string, AccountBuckets>();

  /**
   * Merge `amount` into the account's bucket for `mintSlot`.
   */
  recordMint(account: string, amount: bigint, mintSlot: number): void {
    assertPositiveAmount(amount);
    if (!Number.isSafeInteger(mintSlot) || mintSlot < 0) {
      throw new LedgerError("INVALID_SLOT", `Mint slot must be a non-negative integer, got ${String(mintSlot)}`);
    }

    let entry = this._accounts.get(account);
    if (entry === undefined) {
      entry = { buckets: [], total: 0n };
      this._accounts.set(account, entry);
    }

    const index = lowerBound(entry.buckets, mintSlot);
    const existing = entry.buckets[index];
    if (existing !== undefined && existing.mintSlot === mintSlot) {
      existing.amount += amount;
    } else {
      entry.buckets.splice(index, 0, { mintSlot, amount });
    }
    entry.total += amount;
  }

  /**
   * The account's buckets, oldest first. A fresh array per call.
   */
  listBuckets(account: string): readonly Bucket[] {
    const entry = this._accounts.get(account);
    if (entry === undefined) {
      return [];
    }
    return entry.buckets.map((b) => ({ mintSlot: b.mintSlot, amount: b.amount }));
  }

  /**
   * Take `amount` out of one bucket, removing the bucket when it empties.
   */
  removeOrDecrement(account: string, mintSlot: number, amount: bigint): void {
    assertPositiveAmount(amount);

    const entry = this._accounts.get(account);
    const index = entry === undefined ? -1 : lowerBound(entry.buckets, mintSlot);
    const bucket = entry?.buckets[index];

    if (entry === undefined || bucket === undefined || bucket.mintSlot !== mintSlot || bucket.amount < amount) {
      const held = bucket !== undefined && bucket.mintSlot === mintSlot ? bucket.amount : 0n;
      throw new LedgerError(
        "INSUFFICIENT_BUCKET_AMOUNT",
        `Bucket ${String(mintSlot)} of "${account}" holds ${held.toString()}, cannot remove ${amount.toString()}`,
        { account, mintSlot: String(mintSlot), held: held.toString(), requested: amount.toString() },
      );
    }

    bucket.amount -= amount;
    entry.total -= amount;
    if (bucket.amount === 0n) {
      entry.buckets.splice(index, 1);
    }
    if (entry.buckets.length === 0) {
      this._accounts.delete(account);
    }
  }

  /**
   * Amount held in one bucket, 0n when absent.
   */
  bucketAmount(account: string, mintSlot: number): bigint {
    const entry = this._accounts.get(account);
    if (entry === undefined) {
      return 0n;
    }
    const bucket = entry.buckets[lowerBound(entry.buckets, mintSlot)];
    return bucket !== undefined && bucket.mintSlot === mintSlot ? bucket.amount : 0n;
  }

  /**
   * Sum of every stored bucket, expired or not.
   */
  rawBalance(account: string): bigint {
    return this._accounts.get(account)?.total ?? 0n;
  }

  /**
   * Drop every bucket minted before `floor`. Returns the amount dropped.
   */
  prune(account: string, floor: number): bigint {
    const entry = this._accounts.get(account);
    if (entry === undefined) {
      return 0n;
    }

    const cut = lowerBound(entry.buckets, floor);
    if (cut === 0) {
      return 0n;
    }

    let dropped = 0n;
    for (const bucket of entry.buckets.splice(0, cut)) {
      dropped += bucket.amount;
    }
    entry.total -= dropped;
    if (entry.buckets.length === 0) {
      this._accounts.delete(account);
    }
    return dropped;
  }

  has(account: string): boolean {
    return this._accounts.has(account);
  }

  /**
   * Accounts holding at least one bucket.
   */
  accounts(): readonly string[] {
    return [...this._accounts.keys()];
  }

  get accountCount(): number {
    return this._accounts.size;
  }
}
