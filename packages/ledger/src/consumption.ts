/**
 * @lapse/ledger — Unit selection for debits.
 *
 * Decides which buckets a transfer or burn draws from: live buckets,
 * oldest mint slot first, until the amount is covered. Planning is
 * separate from applying so a short balance fails before any bucket
 * is touched.
 */

import type { Bucket } from "@lapse/types";
import { assertNonNegativeAmount } from "./amount-math.js";
import { liveFloor, sumLiveBuckets } from "./balance-calculator.js";
import type { BucketMovement } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Plan an oldest-first debit of `amount` from `buckets`.
 *
 * `buckets` must be sorted by mintSlot ascending. Expired buckets are
 * skipped. Throws LedgerError("INSUFFICIENT_BALANCE") when the live
 * total is short; a zero amount plans nothing.
 */
export function planDebit(
  account: string,
  buckets: readonly Bucket[],
  amount: bigint,
  currentSlot: number,
  validityWindowSlots: number,
): readonly BucketMovement[] {
  assertNonNegativeAmount(amount);

  const available = sumLiveBuckets(buckets, currentSlot, validityWindowSlots);
  if (available < amount) {
    throw new LedgerError(
      "INSUFFICIENT_BALANCE",
      `Insufficient balance for "${account}": available ${available.toString()}, requested ${amount.toString()}`,
      { account, available: available.toString(), requested: amount.toString() },
    );
  }

  const floor = liveFloor(currentSlot, validityWindowSlots);
  const plan: BucketMovement[] = [];
  let remaining = amount;

  for (const bucket of buckets) {
    if (remaining === 0n) break;
    if (bucket.mintSlot < floor) continue;

    const take = bucket.amount < remaining ? bucket.amount : remaining;
    plan.push({ mintSlot: bucket.mintSlot, amount: take });
    remaining -= take;
  }

  return plan;
}
