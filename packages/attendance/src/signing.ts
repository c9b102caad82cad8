/**
 * @proofpass/attendance — Issuer proofs.
 *
 * The issuer signs keccak256(encodePacked(address recipient,
 * bytes32 eventRef, string metadataURI)) as an Ethereum personal
 * message. The registry recovers the signer and compares it with the
 * configured issuer.
 */

import { encodePacked, keccak256, recoverMessageAddress } from "viem";
import type { LocalAccount } from "viem";
import type { Address, Hex } from "@proofpass/types";
import { sameAddress } from "@proofpass/types";
import type { IssuanceFields } from "./types.js";

/** The 32-byte digest an issuer signs for one issuance. */
export function issuanceDigest(fields: IssuanceFields): Hex {
  return keccak256(
    encodePacked(
      ["address", "bytes32", "string"],
      [fields.recipient, fields.eventRef, fields.metadataURI],
    ),
  );
}

/**
 * Sign an issuance with a local account (the issuer signing service).
 */
export async function signIssuance(
  signer: Pick<LocalAccount, "signMessage">,
  fields: IssuanceFields,
): Promise<Hex> {
  return signer.signMessage({ message: { raw: issuanceDigest(fields) } });
}

/**
 * Recover the address that signed an issuance, or undefined when the
 * proof is not a well-formed signature.
 */
export async function recoverIssuer(
  fields: IssuanceFields,
  proof: Hex,
): Promise<Address | undefined> {
  try {
    return await recoverMessageAddress({
      message: { raw: issuanceDigest(fields) },
      signature: proof,
    });
  } catch {
    return undefined;
  }
}

/**
 * True iff `proof` is a valid signature over `fields` by `expectedSigner`.
 */
export async function verifyIssuanceProof(
  fields: IssuanceFields,
  proof: Hex,
  expectedSigner: Address,
): Promise<boolean> {
  const signer = await recoverIssuer(fields, proof);
  return signer !== undefined && sameAddress(signer, expectedSigner);
}
