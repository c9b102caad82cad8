/**
 * @proofpass/attestation — Attestation ids.
 *
 * id = keccak256(abi.encode(bytes32 eventRef, address holder,
 *                           uint256 tokenId, bool isUpgrade,
 *                           uint256 sequence))
 *
 * The per-log sequence keeps ids distinct for identical inputs.
 */

import { encodeAbiParameters, keccak256 } from "viem";
import type { Hex } from "@proofpass/types";
import type { AttestationInput } from "./types.js";

const ID_PARAMETERS = [
  { type: "bytes32" },
  { type: "address" },
  { type: "uint256" },
  { type: "bool" },
  { type: "uint256" },
] as const;

export function computeAttestationId(input: AttestationInput, sequence: number): Hex {
  return keccak256(
    encodeAbiParameters(ID_PARAMETERS, [
      input.eventRef,
      input.holder,
      BigInt(input.tokenId),
      input.isUpgrade,
      BigInt(sequence),
    ]),
  );
}
