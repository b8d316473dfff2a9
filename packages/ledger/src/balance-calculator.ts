/**
 * @lapse/ledger — Expiry-aware balance aggregation.
 *
 * Sums an account's buckets, counting only those still inside the
 * validity window. Expired buckets contribute zero whether or not
 * they have been pruned.
 *
 * Rules:
 * - A bucket minted in slot k is live while currentSlot < k + window
 * - Sums are bigint and never truncate
 */

import type { Bucket } from "@lapse/types";

/**
 * Oldest slot index that can still be live at `currentSlot`.
 * Saturates at zero.
 */
export function liveFloor(currentSlot: number, validityWindowSlots: number): number {
  return Math.max(0, currentSlot - validityWindowSlots + 1);
}

/**
 * Spendable balance at `currentSlot`: every bucket at or above the live floor.
 */
export function sumLiveBuckets(
  buckets: Iterable<Bucket>,
  currentSlot: number,
  validityWindowSlots: number,
): bigint {
  const floor = liveFloor(currentSlot, validityWindowSlots);
  let total = 0n;
  for (const bucket of buckets) {
    if (bucket.mintSlot >= floor) {
      total += bucket.amount;
    }
  }
  return total;
}

/**
 * Balance as of a past slot: buckets minted no later than `slot` and
 * still live relative to it. Amounts are the buckets' current contents.
 */
export function sumBucketsAsOf(
  buckets: Iterable<Bucket>,
  slot: number,
  validityWindowSlots: number,
): bigint {
  const floor = liveFloor(slot, validityWindowSlots);
  let total = 0n;
  for (const bucket of buckets) {
    if (bucket.mintSlot >= floor && bucket.mintSlot <= slot) {
      total += bucket.amount;
    }
  }
  return total;
}

/**
 * Sum of every bucket, live or expired.
 */
export function sumAllBuckets(buckets: Iterable<Bucket>): bigint {
  let total = 0n;
  for (const bucket of buckets) {
    total += bucket.amount;
  }
  return total;
}
