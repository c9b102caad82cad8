/**
 * @proofpass/runtime — Address normalization.
 *
 * Stored identities are checksummed so that equal addresses compare
 * equal as strings; inputs may arrive in any case.
 */

import { getAddress } from "viem";
import type { Address } from "@proofpass/types";
import { isAddress, isZeroAddress } from "@proofpass/types";

/**
 * Checksummed form of `value`, or undefined if it is not a 20-byte
 * hex address.
 */
export function toChecksumAddress(value: unknown): Address | undefined {
  return isAddress(value) ? getAddress(value) : undefined;
}

/**
 * Checksummed form of `value`, or undefined if it is malformed or the
 * zero address.
 */
export function toNonZeroAddress(value: unknown): Address | undefined {
  const address = toChecksumAddress(value);
  return address === undefined || isZeroAddress(address) ? undefined : address;
}
