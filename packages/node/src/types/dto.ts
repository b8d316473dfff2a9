/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Request bodies carry amounts as decimal strings in token units.
 * Responses carry every amount twice: formatted and in base units.
 */

import { z } from "zod";
import { isAccountAddress } from "@lapse/types";
import type { Address, ExpiryType, Frame } from "@lapse/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .trim()
  .refine((value) => isAccountAddress(value), {
    message: "Must be a 20-byte hex address with a valid checksum",
  });

export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Must be a non-negative decimal string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Request DTOs
// =============================================================================

export const MintSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

export const BurnSchema = z.object({
  from: AddressSchema,
  amount: AmountSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
  /** Spend only the bucket minted in this epoch */
  epoch: z.number().int().min(0).optional(),
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ApproveSchema = z.object({
  spender: AddressSchema,
  amount: z.union([z.literal("max"), AmountSchema]),
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const TransferFromSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: AmountSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

export const BalanceQuerySchema = z.object({
  slot: z.coerce.number().int().min(0).optional(),
});

export const ListEventsQuerySchema = PaginationQuerySchema;

// =============================================================================
// Response Views
// =============================================================================

export interface AmountView {
  /** Decimal string scaled by the token's decimals */
  readonly amount: string;
  /** Base units as a decimal integer string */
  readonly raw: string;
}

export type EventView =
  | {
      readonly sequence: number;
      readonly tick: number;
      readonly type: "Transfer";
      readonly from: Address;
      readonly to: Address;
      readonly value: AmountView;
    }
  | {
      readonly sequence: number;
      readonly tick: number;
      readonly type: "Approval";
      readonly owner: Address;
      readonly spender: Address;
      readonly value: AmountView;
    };

export interface TokenInfoView {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly expiryType: ExpiryType;
  readonly window: {
    readonly unitDuration: number;
    readonly slotsPerEra: number;
    readonly validityWindowSlots: number;
    readonly genesisTick: number;
    readonly validityPeriod: number;
  };
  /** Ticks `[start, end)` during which minting is open; null when always open */
  readonly mintWindow: { readonly start: number; readonly end: number } | null;
  readonly totalSupply: AmountView;
}

export interface WindowView {
  readonly tick: number;
  readonly epoch: number;
  readonly era: number;
  readonly slot: number;
  readonly frame: Frame;
}

export interface BalanceView {
  readonly address: Address;
  /** Present when the balance was taken as of a given slot */
  readonly slot?: number;
  readonly balance: AmountView;
}

export interface BucketView {
  readonly mintSlot: number;
  readonly era: number;
  readonly slot: number;
  /** First slot in which the bucket no longer counts */
  readonly expiresAtSlot: number;
  /** First tick the bucket counts */
  readonly startTick: number;
  /** First tick it no longer counts */
  readonly endTick: number;
  readonly expired: boolean;
  readonly amount: AmountView;
}

export interface BucketsView {
  readonly address: Address;
  readonly currentEpoch: number;
  readonly buckets: readonly BucketView[];
}

export interface AllowanceView {
  readonly owner: Address;
  readonly spender: Address;
  readonly allowance: AmountView;
  readonly infinite: boolean;
}
