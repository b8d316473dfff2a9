/**
 * @lapse/token — Clocks.
 *
 * - ManualClock: set or advanced by hand (tests, replays)
 * - SystemClock: wall-clock milliseconds, for timestamp windows
 * - BlockTimeClock: block height estimated from elapsed wall time
 */

import type { Clock } from "./types.js";
import { TokenError } from "./types.js";

function assertTick(tick: number): void {
  if (!Number.isSafeInteger(tick) || tick < 0) {
    throw new TokenError("INVALID_TICK", `Tick must be a non-negative integer, got ${String(tick)}`);
  }
}

// =============================================================================
// ManualClock
// =============================================================================

/**
 * A clock that only moves when told to, and never backwards.
 */
export class ManualClock implements Clock {
  private _tick: number;

  constructor(start = 0) {
    assertTick(start);
    this._tick = start;
  }

  now(): number {
    return this._tick;
  }

  set(tick: number): void {
    assertTick(tick);
    if (tick < this._tick) {
      throw new TokenError(
        "INVALID_TICK",
        `Clock cannot move backwards from ${String(this._tick)} to ${String(tick)}`,
      );
    }
    this._tick = tick;
  }

  advance(delta: number): void {
    assertTick(delta);
    this.set(this._tick + delta);
  }
}

// =============================================================================
// SystemClock
// =============================================================================

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

// =============================================================================
// BlockTimeClock
// =============================================================================

export interface BlockTimeClockOptions {
  /** Milliseconds per block */
  readonly blockTimeMs: number;
  /** Block height at `startedAt` (default: 0) */
  readonly startBlock?: number | undefined;
  /** Wall time the start block was produced (default: now) */
  readonly startedAt?: number | undefined;
  /** Wall-clock source (default: Date.now) */
  readonly wallClock?: (() => number) | undefined;
}

/**
 * Estimates the current block height as
 * startBlock + floor((wallClock() - startedAt) / blockTimeMs).
 */
export class BlockTimeClock implements Clock {
  readonly blockTimeMs: number;
  readonly startBlock: number;
  readonly startedAt: number;
  private readonly _wallClock: () => number;

  constructor(options: BlockTimeClockOptions) {
    if (!Number.isSafeInteger(options.blockTimeMs) || options.blockTimeMs <= 0) {
      throw new TokenError(
        "INVALID_TICK",
        `Block time must be a positive integer, got ${String(options.blockTimeMs)}`,
      );
    }
    this._wallClock = options.wallClock ?? Date.now;
    this.blockTimeMs = options.blockTimeMs;
    this.startBlock = options.startBlock ?? 0;
    this.startedAt = options.startedAt ?? this._wallClock();
    assertTick(this.startBlock);
  }

  now(): number {
    const elapsed = Math.max(0, this._wallClock() - this.startedAt);
    return this.startBlock + Math.floor(elapsed / this.blockTimeMs);
  }
}
