/**
 * @lapse/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * then derives the token's window and clock from it.
 */

import { z } from "zod";
import {
  YEAR_IN_MILLISECONDS,
  windowConfigFromBlockTime,
} from "@lapse/ledger";
import type { WindowConfigInput } from "@lapse/ledger";
import { BlockTimeClock, SystemClock } from "@lapse/token";
import type { Clock, TokenConfig } from "@lapse/token";
import { isAccountAddress } from "@lapse/types";
import { getAddress } from "viem";
import type { ApiKeyRecord } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),

    // Token
    TOKEN_NAME: z.string().min(1).default("Lapse Points"),
    TOKEN_SYMBOL: z.string().min(1).default("LPS"),
    TOKEN_DECIMALS: z.coerce.number().int().min(0).max(255).default(18),

    // Window
    EXPIRY_TYPE: z.enum(["blocknumber", "timestamp"]).default("blocknumber"),
    BLOCK_TIME_MS: z.coerce.number().int().min(100).max(600000).default(400),
    SLOT_DURATION: z.coerce.number().int().min(1).optional(),
    SLOTS_PER_ERA: z.coerce.number().int().min(1).max(12).default(4),
    FRAME_SIZE: z.coerce.number().int().min(1).max(64).default(2),
    GENESIS_TICK: z.coerce.number().int().min(0).default(0),
    MINT_WINDOW_START: z.coerce.number().int().min(0).optional(),
    MINT_WINDOW_END: z.coerce.number().int().min(0).optional(),

    // Ledger
    TRANSFER_STAMPING: z.enum(["preserve", "restamp"]).default("preserve"),
    PRUNE_ON_WRITE: z
      .string()
      .transform((v) => v === "true")
      .default("false"),

    // Rate limiting
    RATE_LIMIT_RPM: z.coerce.number().int().min(1).default(100),
    RATE_LIMIT_BURST: z.coerce.number().int().min(1).default(20),
    RATE_LIMIT_WRITE_COST: z.coerce.number().int().min(1).default(1),

    // Idempotency
    IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
    IDEMPOTENCY_MAX_ENTRIES: z.coerce.number().int().min(1).default(10000),

    // Event log
    EVENT_LOG_LIMIT: z.coerce.number().int().min(1).default(100000),
  })
  .refine((config) => (config.MINT_WINDOW_START === undefined) === (config.MINT_WINDOW_END === undefined), {
    message: "MINT_WINDOW_START and MINT_WINDOW_END must be set together",
    path: ["MINT_WINDOW_END"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:0xAccount1,key2:role2:0xAccount2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, account] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || account === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:account`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isAccountAddress(account)) {
      throw new Error(`Invalid account "${account}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, role, account: getAddress(account) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Token Wiring
// =============================================================================

/**
 * Window for the configured expiry type.
 *
 * Block windows derive their slot length from BLOCK_TIME_MS unless
 * SLOT_DURATION overrides it. Timestamp windows default to a year per era.
 */
export function windowFromConfig(config: AppConfig): WindowConfigInput {
  if (config.EXPIRY_TYPE === "blocknumber" && config.SLOT_DURATION === undefined) {
    return windowConfigFromBlockTime(
      config.BLOCK_TIME_MS,
      config.SLOTS_PER_ERA,
      config.FRAME_SIZE,
      config.GENESIS_TICK,
    );
  }

  return {
    unitDuration:
      config.SLOT_DURATION ?? Math.floor(YEAR_IN_MILLISECONDS / config.SLOTS_PER_ERA),
    slotsPerEra: config.SLOTS_PER_ERA,
    validityWindowSlots: config.FRAME_SIZE,
    genesisTick: config.GENESIS_TICK,
    expiryType: config.EXPIRY_TYPE,
  };
}

export function tokenConfigFromConfig(config: AppConfig): TokenConfig {
  return {
    name: config.TOKEN_NAME,
    symbol: config.TOKEN_SYMBOL,
    decimals: config.TOKEN_DECIMALS,
    window: windowFromConfig(config),
    ledger: {
      transferStamping: config.TRANSFER_STAMPING,
      pruneOnWrite: config.PRUNE_ON_WRITE,
    },
    mintWindow:
      config.MINT_WINDOW_START !== undefined && config.MINT_WINDOW_END !== undefined
        ? { start: config.MINT_WINDOW_START, end: config.MINT_WINDOW_END }
        : undefined,
    eventLogLimit: config.EVENT_LOG_LIMIT,
  };
}

/**
 * Block heights are simulated from BLOCK_TIME_MS starting at GENESIS_TICK;
 * timestamp windows read the wall clock.
 */
export function clockFromConfig(config: AppConfig): Clock {
  if (config.EXPIRY_TYPE === "blocknumber") {
    return new BlockTimeClock({
      blockTimeMs: config.BLOCK_TIME_MS,
      startBlock: config.GENESIS_TICK,
    });
  }
  return new SystemClock();
}
