/**
 * @lapse/token — Address normalisation.
 */

import { getAddress, isAddress } from "viem";
import type { Address } from "@lapse/types";
import { ZERO_ADDRESS } from "@lapse/types";
import { TokenError } from "./types.js";

/**
 * Validate an address and return its EIP-55 checksummed form.
 * Mixed-case input must already carry a valid checksum.
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new TokenError("INVALID_ADDRESS", `Invalid address: "${value}"`, { address: value });
  }
  return getAddress(value);
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}
