/**
 * @proofpass/coordinator — Event references.
 *
 * ref = keccak256(encodePacked(address creator, string name, uint256 n))
 * where n is the coordinator's creation counter, so two events with
 * the same creator and name still get distinct refs.
 */

import { encodePacked, keccak256 } from "viem";
import type { Address, EventRef } from "@proofpass/types";

export function deriveEventRef(creator: Address, name: string, counter: number): EventRef {
  return keccak256(encodePacked(["address", "string", "uint256"], [creator, name, BigInt(counter)]));
}
