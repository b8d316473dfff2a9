/**
 * Global error handler.
 *
 * Maps domain errors (LedgerError, TokenError) and ApiError to HTTP
 * statuses and renders the error envelope. Anything else is a 500 whose
 * message is not exposed.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { LedgerError } from "@lapse/ledger";
import { TokenError } from "@lapse/token";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Window and input errors
  INVALID_TIME_WINDOW: 400,
  INVALID_BLOCK_TIME: 400,
  INVALID_TICK: 400,
  INVALID_SLOT: 400,
  SLOT_OVERFLOW: 400,
  INVALID_AMOUNT: 400,
  INVALID_SNAPSHOT: 400,
  INVALID_ADDRESS: 400,
  INVALID_SENDER: 400,
  INVALID_RECEIVER: 400,
  INVALID_APPROVER: 400,
  INVALID_SPENDER: 400,

  // Units or allowance the caller does not have
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_BUCKET_AMOUNT: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  SLOT_EXPIRED: 422,
  MINT_WINDOW_CLOSED: 422,
};

export function statusForCode(code: string): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ApiError) {
    return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
  }

  if (err instanceof LedgerError || err instanceof TokenError) {
    const status = statusForCode(err.code);
    if (status === 500) {
      return c.json(createErrorEnvelope(err.code, "Internal server error"), 500);
    }
    return c.json(createErrorEnvelope(err.code, err.message, err.details), status);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
