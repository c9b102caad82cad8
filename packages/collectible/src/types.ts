/**
 * @proofpass/collectible — Types.
 */

import type { Address, DomainErrorCode, ErrorKind } from "@proofpass/types";
import { errorKindOf } from "@proofpass/types";

// ─── Tokens ──────────────────────────────────────────────────────────────

export interface CollectibleToken {
  readonly tokenId: number;
  readonly owner: Address;

  /** The attendance token this collectible was paired from. */
  readonly attendanceTokenId: number;

  /** Empty until set; tokenURI() then falls back to base URI + id. */
  readonly metadataURI: string;

  /** Unix seconds */
  readonly createdAt: number;
}

/**
 * What happens to the attendance token when it is paired.
 * - burn: the attendance token is voided
 * - companion: the attendance token is kept and flagged
 */
export type UpgradeVariant = "burn" | "companion";

/**
 * The part of the attendance registry the pairing operation depends on.
 */
export interface AttendanceRegistryPort {
  readonly address: Address;
  isApprovedOrOwner(caller: Address, tokenId: number): boolean;
  void(caller: Address, tokenId: number): void;
  markCompanion(caller: Address, tokenId: number): void;
}

// ─── Fees ────────────────────────────────────────────────────────────────

/** Basis-point shares; both positive, summing to 10,000. */
export interface FeeSplit {
  readonly treasuryBps: number;
  readonly organizerBps: number;
}

export interface FeeDistribution {
  readonly fee: bigint;
  readonly treasuryAmount: bigint;
  readonly organizerAmount: bigint;

  /** amountPaid - fee */
  readonly refund: bigint;
}

export type PayoutPurpose = "treasury" | "organizer" | "refund" | "withdrawal";

// ─── Pairing ─────────────────────────────────────────────────────────────

export interface PairRequest {
  readonly attendanceTokenId: number;
  readonly organizer: Address;
  readonly payer: Address;
  readonly amountPaid: bigint;
}

export interface PairReceipt {
  readonly collectibleId: number;
  readonly attendanceTokenId: number;
  readonly payer: Address;
  readonly organizer: Address;
  readonly distribution: FeeDistribution;
}

export type CanPairReason = "can pair" | "not owner" | "already paired" | "paused";

export interface CanPairResult {
  readonly canPair: boolean;
  readonly reason: CanPairReason;
}

// ─── Configuration ───────────────────────────────────────────────────────

export interface CollectibleRegistryConfig {
  readonly address: Address;
  readonly admin: Address;
  readonly treasury: Address;
  readonly attendance: AttendanceRegistryPort;

  /** Upgrade fee in wei */
  readonly fee: bigint;
  readonly split?: FeeSplit | undefined;
  readonly variant?: UpgradeVariant | undefined;
  readonly baseURI?: string | undefined;
  readonly name?: string | undefined;
  readonly symbol?: string | undefined;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type CollectibleErrorCode = Extract<
  DomainErrorCode,
  | "INVALID_ORGANIZER"
  | "INVALID_RECIPIENT"
  | "INVALID_ADDRESS"
  | "INVALID_SPLIT"
  | "INVALID_FEE"
  | "INSUFFICIENT_FEE"
  | "UNAUTHORIZED"
  | "NOT_OWNER"
  | "ALREADY_PAIRED"
  | "PAUSED"
  | "NOT_PAUSED"
  | "NOT_FOUND"
  | "NOTHING_TO_WITHDRAW"
  | "TRANSFER_FAILED"
>;

export interface CollectibleErrorOptions extends ErrorOptions {
  /** Set on TRANSFER_FAILED: which payout failed. */
  readonly purpose?: PayoutPurpose | undefined;
}

export class CollectibleError extends Error {
  public readonly code: CollectibleErrorCode;
  public readonly purpose: PayoutPurpose | undefined;

  constructor(code: CollectibleErrorCode, message: string, options?: CollectibleErrorOptions) {
    super(message, options);
    this.name = "CollectibleError";
    this.code = code;
    this.purpose = options?.purpose;
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }
}
