/**
 * @proofpass/attestation — Types.
 */

import type { Address, DomainErrorCode, ErrorKind, EventRef, Hex } from "@proofpass/types";
import { errorKindOf } from "@proofpass/types";

export interface AttestationInput {
  readonly eventRef: EventRef;
  readonly holder: Address;
  readonly tokenId: number;
  readonly isUpgrade: boolean;
}

/**
 * An immutable attendance (isUpgrade = false) or upgrade
 * (isUpgrade = true) record.
 */
export interface Attestation extends AttestationInput {
  readonly attestationId: Hex;

  /** Position in the log, starting at 0. Part of the id preimage. */
  readonly sequence: number;

  /** Unix seconds */
  readonly createdAt: number;
}

/**
 * Parallel arrays; entry i of each describes the i-th attestation.
 */
export interface AttestationBatch {
  readonly eventRefs: readonly EventRef[];
  readonly holders: readonly Address[];
  readonly tokenIds: readonly number[];
  readonly isUpgrade: readonly boolean[];
}

export interface AttestationLogConfig {
  readonly address: Address;
  readonly admin: Address;
}

export type AttestationErrorCode = Extract<
  DomainErrorCode,
  | "INVALID_EVENT_REF"
  | "INVALID_HOLDER"
  | "INVALID_TOKEN_ID"
  | "INVALID_ADDRESS"
  | "ARRAY_LENGTH_MISMATCH"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
>;

export class AttestationError extends Error {
  public readonly code: AttestationErrorCode;

  constructor(code: AttestationErrorCode, message: string) {
    super(message);
    this.name = "AttestationError";
    this.code = code;
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }
}
