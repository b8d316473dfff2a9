/**
 * @lapse/ledger — Window arithmetic.
 *
 * Converts absolute ticks (block heights or millisecond timestamps)
 * into slot indexes, and slot indexes into era/slot pairs and frames.
 *
 * Rules:
 * - slotIndex = floor((tick - genesisTick) / unitDuration)
 * - A bucket expires once the current slot reaches mintSlot + window
 * - Every derived quantity stays a safe integer; configurations
 *   that could overflow are rejected up front
 */

import type { EraAndSlot, Frame } from "@lapse/types";
import { liveFloor } from "./balance-calculator.js";
import type { TimeWindow, WindowConfig, WindowConfigInput } from "./types.js";
import { LedgerError } from "./types.js";

// ─── Bounds ──────────────────────────────────────────────────────────────

export const MINIMUM_SLOTS_PER_ERA = 1;
export const MAXIMUM_SLOTS_PER_ERA = 12;
export const MINIMUM_FRAME_SIZE = 1;
export const MAXIMUM_FRAME_SIZE = 64;
export const MINIMUM_BLOCK_TIME_MS = 100;
export const MAXIMUM_BLOCK_TIME_MS = 600_000;
export const YEAR_IN_MILLISECONDS = 31_556_926_000;

// ─── Configuration ───────────────────────────────────────────────────────

function assertIntegerInRange(
  name: string,
  value: number,
  min: number,
  max: number,
): void {
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new LedgerError(
      "INVALID_TIME_WINDOW",
      `${name} must be an integer in [${String(min)}, ${String(max)}], got ${String(value)}`,
    );
  }
}

/**
 * Validate a window configuration and fill in defaults.
 * Throws LedgerError("INVALID_TIME_WINDOW") on any violation.
 */
export function createWindowConfig(input: WindowConfigInput): WindowConfig {
  assertIntegerInRange("unitDuration", input.unitDuration, 1, Number.MAX_SAFE_INTEGER);
  assertIntegerInRange("slotsPerEra", input.slotsPerEra, MINIMUM_SLOTS_PER_ERA, MAXIMUM_SLOTS_PER_ERA);
  assertIntegerInRange(
    "validityWindowSlots",
    input.validityWindowSlots,
    MINIMUM_FRAME_SIZE,
    MAXIMUM_FRAME_SIZE,
  );

  const genesisTick = input.genesisTick ?? 0;
  assertIntegerInRange("genesisTick", genesisTick, 0, Number.MAX_SAFE_INTEGER);

  const longest = Math.max(input.slotsPerEra, input.validityWindowSlots);
  if (!Number.isSafeInteger(input.unitDuration * longest)) {
    throw new LedgerError(
      "INVALID_TIME_WINDOW",
      `unitDuration ${String(input.unitDuration)} overflows when spanning ${String(longest)} slots`,
    );
  }

  return {
    unitDuration: input.unitDuration,
    slotsPerEra: input.slotsPerEra,
    validityWindowSlots: input.validityWindowSlots,
    genesisTick,
    expiryType: input.expiryType ?? "blocknumber",
  };
}

/**
 * Derive a block-based window from a block time.
 *
 * An era spans one year of blocks, split evenly into `slotsPerEra`
 * slots (remainders are dropped, as integer division on-chain does).
 * 400 ms blocks with 4 slots per era give 19_723_078 blocks per slot.
 */
export function windowConfigFromBlockTime(
  blockTimeMs: number,
  slotsPerEra: number,
  frameSize: number,
  genesisTick = 0,
): WindowConfig {
  if (
    !Number.isInteger(blockTimeMs) ||
    blockTimeMs < MINIMUM_BLOCK_TIME_MS ||
    blockTimeMs > MAXIMUM_BLOCK_TIME_MS
  ) {
    throw new LedgerError(
      "INVALID_BLOCK_TIME",
      `Block time must be an integer in [${String(MINIMUM_BLOCK_TIME_MS)}, ${String(MAXIMUM_BLOCK_TIME_MS)}] ms, got ${String(blockTimeMs)}`,
    );
  }
  assertIntegerInRange("slotsPerEra", slotsPerEra, MINIMUM_SLOTS_PER_ERA, MAXIMUM_SLOTS_PER_ERA);

  const blocksPerYear = Math.floor(YEAR_IN_MILLISECONDS / blockTimeMs);

  return createWindowConfig({
    unitDuration: Math.floor(blocksPerYear / slotsPerEra),
    slotsPerEra,
    validityWindowSlots: frameSize,
    genesisTick,
    expiryType: "blocknumber",
  });
}

/**
 * Validate a half-open `[start, end)` tick range.
 * An empty or inverted range throws LedgerError("INVALID_TIME_WINDOW").
 */
export function createTimeWindow(start: number, end: number): TimeWindow {
  assertIntegerInRange("start", start, 0, Number.MAX_SAFE_INTEGER);
  assertIntegerInRange("end", end, 0, Number.MAX_SAFE_INTEGER);
  if (start >= end) {
    throw new LedgerError(
      "INVALID_TIME_WINDOW",
      `Time window start ${String(start)} must precede its end ${String(end)}`,
      { start: String(start), end: String(end) },
    );
  }
  return { start, end };
}

// ─── Sliding Window ──────────────────────────────────────────────────────

function assertSlot(slotIndex: number): void {
  if (!Number.isSafeInteger(slotIndex) || slotIndex < 0) {
    throw new LedgerError("INVALID_SLOT", `Slot index must be a non-negative integer, got ${String(slotIndex)}`);
  }
}

/**
 * Pure window arithmetic over a fixed configuration.
 */
export class SlidingWindow {
  readonly config: WindowConfig;

  constructor(config: WindowConfigInput) {
    this.config = createWindowConfig(config);
  }

  get validityWindowSlots(): number {
    return this.config.validityWindowSlots;
  }

  /** Ticks a bucket stays spendable, counted from the start of its slot. */
  get validityPeriod(): number {
    return this.config.unitDuration * this.config.validityWindowSlots;
  }

  get ticksPerEra(): number {
    return this.config.unitDuration * this.config.slotsPerEra;
  }

  /**
   * Slot index containing `tick`.
   */
  slotIndexAt(tick: number): number {
    if (!Number.isSafeInteger(tick) || tick < 0) {
      throw new LedgerError("INVALID_TICK", `Tick must be a non-negative integer, got ${String(tick)}`);
    }
    if (tick < this.config.genesisTick) {
      throw new LedgerError(
        "INVALID_TICK",
        `Tick ${String(tick)} precedes the window genesis at ${String(this.config.genesisTick)}`,
      );
    }
    return Math.floor((tick - this.config.genesisTick) / this.config.unitDuration);
  }

  /**
   * First tick of a slot.
   */
  slotStartTick(slotIndex: number): number {
    assertSlot(slotIndex);
    const tick = this.config.genesisTick + slotIndex * this.config.unitDuration;
    if (!Number.isSafeInteger(tick)) {
      throw new LedgerError("SLOT_OVERFLOW", `Slot ${String(slotIndex)} starts beyond the safe tick range`);
    }
    return tick;
  }

  /**
   * First slot in which a bucket minted in `mintSlot` is expired.
   */
  expirySlotIndex(mintSlot: number): number {
    assertSlot(mintSlot);
    const expiry = mintSlot + this.config.validityWindowSlots;
    if (!Number.isSafeInteger(expiry)) {
      throw new LedgerError("SLOT_OVERFLOW", `Expiry of slot ${String(mintSlot)} overflows`);
    }
    return expiry;
  }

  /**
   * Ticks during which a bucket minted in `mintSlot` is spendable.
   */
  bucketTimeWindow(mintSlot: number): TimeWindow {
    return {
      start: this.slotStartTick(mintSlot),
      end: this.slotStartTick(this.expirySlotIndex(mintSlot)),
    };
  }

  isSlotExpired(mintSlot: number, currentSlot: number): boolean {
    assertSlot(currentSlot);
    return currentSlot >= this.expirySlotIndex(mintSlot);
  }

  isExpired(mintSlot: number, tick: number): boolean {
    return this.isSlotExpired(mintSlot, this.slotIndexAt(tick));
  }

  liveFloor(currentSlot: number): number {
    assertSlot(currentSlot);
    return liveFloor(currentSlot, this.config.validityWindowSlots);
  }

  eraAndSlot(slotIndex: number): EraAndSlot {
    assertSlot(slotIndex);
    return {
      era: Math.floor(slotIndex / this.config.slotsPerEra),
      slot: slotIndex % this.config.slotsPerEra,
    };
  }

  /**
   * The live range at `currentSlot`, from the live floor to the current slot.
   */
  frame(currentSlot: number): Frame {
    const from = this.eraAndSlot(this.liveFloor(currentSlot));
    const to = this.eraAndSlot(currentSlot);
    return {
      fromEra: from.era,
      fromSlot: from.slot,
      toEra: to.era,
      toSlot: to.slot,
    };
  }
}
