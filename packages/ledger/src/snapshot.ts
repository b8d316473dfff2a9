/**
 * @lapse/ledger — Snapshot validation.
 *
 * Snapshots usually come back from JSON, so nothing about their shape is
 * trusted. Every field is checked before a single bucket is restored and
 * every failure surfaces as LedgerError("INVALID_SNAPSHOT").
 */

import { isBucket, isExpiryType } from "@lapse/types";
import { createWindowConfig } from "./window.js";
import type {
  AccountSnapshot,
  BucketSnapshot,
  LedgerSnapshot,
  ResolvedLedgerOptions,
  WindowConfig,
} from "./types.js";
import { LedgerError, TRANSFER_STAMPING_MODES } from "./types.js";

const AMOUNT_PATTERN = /^\d+$/;

function invalid(message: string, details?: Readonly<Record<string, string>>): LedgerError {
  return new LedgerError("INVALID_SNAPSHOT", message, details);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// ─── Sections ────────────────────────────────────────────────────────────

function parseConfig(value: unknown): WindowConfig {
  if (!isRecord(value)) {
    throw invalid("Snapshot config must be an object");
  }

  const { unitDuration, slotsPerEra, validityWindowSlots, genesisTick, expiryType } = value;
  if (
    typeof unitDuration !== "number" ||
    typeof slotsPerEra !== "number" ||
    typeof validityWindowSlots !== "number" ||
    typeof genesisTick !== "number" ||
    !isExpiryType(expiryType)
  ) {
    throw invalid("Snapshot config is incomplete");
  }

  try {
    return createWindowConfig({ unitDuration, slotsPerEra, validityWindowSlots, genesisTick, expiryType });
  } catch (err) {
    if (err instanceof LedgerError) {
      throw invalid(`Snapshot config is invalid: ${err.message}`);
    }
    throw err;
  }
}

function parseOptions(value: unknown): ResolvedLedgerOptions {
  if (!isRecord(value)) {
    throw invalid("Snapshot options must be an object");
  }

  const transferStamping = TRANSFER_STAMPING_MODES.find((mode) => mode === value.transferStamping);
  if (transferStamping === undefined) {
    throw invalid(`Unknown transfer stamping: ${String(value.transferStamping)}`);
  }
  if (typeof value.pruneOnWrite !== "boolean") {
    throw invalid("Snapshot option pruneOnWrite must be a boolean");
  }

  return { transferStamping, pruneOnWrite: value.pruneOnWrite };
}

function parseBuckets(account: string, value: unknown): BucketSnapshot[] {
  if (!Array.isArray(value)) {
    throw invalid(`Buckets of "${account}" must be an array`, { account });
  }

  const slots = new Set<number>();
  return value.map((entry: unknown) => {
    if (!isRecord(entry) || typeof entry.amount !== "string" || !AMOUNT_PATTERN.test(entry.amount)) {
      throw invalid(`A bucket of "${account}" has a malformed amount`, { account });
    }

    const bucket = { mintSlot: entry.mintSlot, amount: BigInt(entry.amount) };
    if (!isBucket(bucket)) {
      throw invalid(
        `A bucket of "${account}" needs a non-negative integer slot and a positive amount`,
        { account, amount: entry.amount },
      );
    }
    if (slots.has(bucket.mintSlot)) {
      throw invalid(`Slot ${String(bucket.mintSlot)} of "${account}" appears twice`, {
        account,
        mintSlot: String(bucket.mintSlot),
      });
    }

    slots.add(bucket.mintSlot);
    return { mintSlot: bucket.mintSlot, amount: entry.amount };
  });
}

function parseAccounts(value: unknown): AccountSnapshot[] {
  if (!Array.isArray(value)) {
    throw invalid("Snapshot accounts must be an array");
  }

  const seen = new Set<string>();
  return value.map((entry: unknown) => {
    if (!isRecord(entry) || typeof entry.account !== "string" || entry.account === "") {
      throw invalid("Snapshot account entries need a non-empty account");
    }
    if (seen.has(entry.account)) {
      throw invalid(`Account "${entry.account}" appears twice`, { account: entry.account });
    }

    seen.add(entry.account);
    return { account: entry.account, buckets: parseBuckets(entry.account, entry.buckets) };
  });
}

// ─── Entry Point ─────────────────────────────────────────────────────────

/**
 * Check an untrusted value against the version 1 snapshot layout.
 */
export function parseLedgerSnapshot(value: unknown): LedgerSnapshot {
  if (!isRecord(value)) {
    throw invalid("Snapshot must be an object");
  }
  if (value.version !== 1) {
    throw invalid(`Unsupported snapshot version: ${String(value.version)}`);
  }
  if (typeof value.createdAt !== "string") {
    throw invalid("Snapshot createdAt must be a string");
  }

  return {
    version: 1,
    config: parseConfig(value.config),
    options: parseOptions(value.options),
    accounts: parseAccounts(value.accounts),
    createdAt: value.createdAt,
  };
}
