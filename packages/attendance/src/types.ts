/**
 * @proofpass/attendance — Types.
 */

import type { Address, DomainErrorCode, EventRef, Hex } from "@proofpass/types";
import { errorKindOf } from "@proofpass/types";
import type { ErrorKind } from "@proofpass/types";

// ─── Tokens ──────────────────────────────────────────────────────────────

export interface AttendanceToken {
  readonly tokenId: number;
  readonly owner: Address;
  readonly eventRef: EventRef;
  readonly metadataURI: string;

  /** Unix seconds */
  readonly issuedAt: number;

  /** Set in the retain-on-companion variant once a collectible is paired. */
  readonly hasCompanion: boolean;
}

/**
 * Every ownership change goes through one entry point.
 * Only mint and burn are ever accepted.
 */
export type OwnershipChange =
  | {
      readonly kind: "mint";
      readonly to: Address;
      readonly eventRef: EventRef;
      readonly metadataURI: string;
    }
  | { readonly kind: "burn"; readonly tokenId: number }
  | {
      readonly kind: "transfer";
      readonly tokenId: number;
      readonly from: Address;
      readonly to: Address;
    };

// ─── Issuance ────────────────────────────────────────────────────────────

/**
 * One issuance mode per deployment:
 * - allow-list: callers on an admin-managed list may issue
 * - signature: anyone may issue with a proof signed by the issuer key
 */
export type IssuanceConfig =
  | { readonly mode: "allow-list" }
  | { readonly mode: "signature"; readonly issuer?: Address | undefined };

export type IssuanceMode = IssuanceConfig["mode"];

/** The three fields an issuer signs. */
export interface IssuanceFields {
  readonly recipient: Address;
  readonly eventRef: EventRef;
  readonly metadataURI: string;
}

export interface IssueRequest extends IssuanceFields {
  /** Issuer signature over the fields; required in signature mode. */
  readonly proof?: Hex | undefined;
}

/**
 * Single-use permission to mint, produced by authorizeIssuance() once
 * the asynchronous checks pass. Only grants created by the registry
 * itself are accepted by commitIssuance().
 */
export interface IssuanceGrant {
  readonly caller: Address;
  readonly recipient: Address;
  readonly eventRef: EventRef;
  readonly metadataURI: string;
  readonly mode: IssuanceMode;

  /** Issuer the proof was checked against (signature mode). */
  readonly verifiedIssuer?: Address | undefined;
}

export interface AttendanceRegistryConfig {
  /** The registry's own identity (caller of void/markCompanion checks etc.) */
  readonly address: Address;
  readonly admin: Address;
  readonly issuance: IssuanceConfig;
  readonly baseURI?: string | undefined;
  readonly name?: string | undefined;
  readonly symbol?: string | undefined;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type AttendanceErrorCode = Extract<
  DomainErrorCode,
  | "INVALID_RECIPIENT"
  | "INVALID_ADDRESS"
  | "EMPTY_METADATA_URI"
  | "INVALID_EVENT_REF"
  | "UNAUTHORIZED"
  | "ISSUER_NOT_CONFIGURED"
  | "INVALID_PROOF"
  | "TRANSFER_NOT_ALLOWED"
  | "DUPLICATE_ISSUANCE"
  | "ISSUANCE_MODE_MISMATCH"
  | "GRANT_CONSUMED"
  | "NOT_FOUND"
>;

export class AttendanceError extends Error {
  public readonly code: AttendanceErrorCode;

  constructor(code: AttendanceErrorCode, message: string) {
    super(message);
    this.name = "AttendanceError";
    this.code = code;
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }
}
