/**
 * @proofpass/coordinator — Types.
 */

import type { Address, DomainErrorCode, ErrorKind, EventRef, Hex } from "@proofpass/types";
import { errorKindOf } from "@proofpass/types";
import type { AttendanceTokenRegistry } from "@proofpass/attendance";
import type { CollectibleTokenRegistry, FeeDistribution } from "@proofpass/collectible";
import type { AttestationLog } from "@proofpass/attestation";

// ─── Events ──────────────────────────────────────────────────────────────

/**
 * An event attendees are minted for.
 *
 * State machine: active ⇄ inactive, creator only, no terminal state.
 */
export interface EventRecord {
  readonly eventRef: EventRef;
  readonly name: string;
  readonly description: string;
  readonly imageRef: string;
  readonly creator: Address;
  readonly active: boolean;

  /** Unix seconds */
  readonly createdAt: number;
  readonly attendeeCount: number;

  /** 0 = unlimited */
  readonly maxAttendees: number;

  /** Free-form metadata of events registered on the admin path. */
  readonly metadata: string;
  readonly legacy: boolean;
}

export interface CreateEventInput {
  readonly name: string;
  readonly description: string;
  readonly imageRef: string;
  readonly maxAttendees: number;
}

export interface UpdateEventInput {
  readonly name: string;
  readonly description: string;
  readonly imageRef: string;
}

// ─── Operations ──────────────────────────────────────────────────────────

export interface MintWithAttestationInput {
  readonly recipient: Address;
  readonly metadataURI: string;
  readonly eventRef: EventRef;

  /** Issuer signature; signature deployments only. */
  readonly proof?: Hex | undefined;
}

export interface MintResult {
  readonly tokenId: number;
  readonly attestationId: Hex;
}

export interface PairWithAttestationInput {
  readonly attendanceTokenId: number;
  readonly organizer: Address;
  readonly eventRef: EventRef;

  /** Wei sent with the call. */
  readonly payment: bigint;
}

export interface PairResult {
  readonly collectibleId: number;
  readonly attestationId: Hex;
  readonly distribution: FeeDistribution;
}

/** The registries the coordinator composes. */
export interface CoordinatorContracts {
  readonly attendance: AttendanceTokenRegistry;
  readonly collectible: CollectibleTokenRegistry;
  readonly attestation: AttestationLog;
}

export interface ContractAddresses {
  readonly attendance: Address;
  readonly collectible: Address;
  readonly attestation: Address;
  readonly coordinator: Address;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type CoordinatorErrorCode = Extract<
  DomainErrorCode,
  | "EMPTY_NAME"
  | "EMPTY_IMAGE_REF"
  | "INVALID_EVENT_REF"
  | "INVALID_CAPACITY"
  | "INVALID_ADDRESS"
  | "EVENT_MISMATCH"
  | "ARRAY_LENGTH_MISMATCH"
  | "UNAUTHORIZED"
  | "NOT_CREATOR"
  | "EVENT_FULL"
  | "EVENT_NOT_ACTIVE"
  | "EVENT_ALREADY_REGISTERED"
  | "EVENT_NOT_REGISTERED"
>;

export class CoordinatorError extends Error {
  public readonly code: CoordinatorErrorCode;

  /** The event being processed, when there is one. */
  public readonly eventRef: EventRef | undefined;

  constructor(code: CoordinatorErrorCode, message: string, eventRef?: EventRef) {
    super(message);
    this.name = "CoordinatorError";
    this.code = code;
    this.eventRef = eventRef;
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }
}
