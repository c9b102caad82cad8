/**
 * @proofpass/collectible — Fee distribution.
 *
 * The treasury share is floor(fee * treasuryBps / 10,000); the organizer
 * receives the remainder, so the two shares always sum to the fee.
 * Anything paid above the fee is refunded to the payer.
 */

import type { Address } from "@proofpass/types";
import type { Ledger } from "@proofpass/ledger";
import { BASIS_POINTS, LedgerError, applyBasisPoints } from "@proofpass/ledger";
import type { FeeDistribution, FeeSplit, PayoutPurpose } from "./types.js";
import { CollectibleError } from "./types.js";

/** 37.5% treasury, 62.5% organizer. */
export const DEFAULT_FEE_SPLIT: FeeSplit = Object.freeze({
  treasuryBps: 3750,
  organizerBps: 6250,
});

/**
 * Throws INVALID_SPLIT unless both shares are positive integers summing
 * to 10,000 basis points.
 */
export function validateFeeSplit(split: FeeSplit): void {
  const { treasuryBps, organizerBps } = split;
  if (!Number.isInteger(treasuryBps) || !Number.isInteger(organizerBps)) {
    throw new CollectibleError("INVALID_SPLIT", "Fee split must be whole basis points");
  }
  if (treasuryBps <= 0 || organizerBps <= 0) {
    throw new CollectibleError("INVALID_SPLIT", "Both fee split shares must be positive");
  }
  if (treasuryBps + organizerBps !== BASIS_POINTS) {
    throw new CollectibleError(
      "INVALID_SPLIT",
      `Fee split must sum to ${String(BASIS_POINTS)}, got ${String(treasuryBps + organizerBps)}`,
    );
  }
}

/**
 * Split `fee` between treasury and organizer and work out the refund
 * of an overpayment.
 */
export function computeFeeDistribution(
  fee: bigint,
  split: FeeSplit,
  amountPaid: bigint = fee,
): FeeDistribution {
  if (fee < 0n) {
    throw new CollectibleError("INVALID_FEE", `Fee cannot be negative: ${fee.toString()}`);
  }
  if (amountPaid < fee) {
    throw new CollectibleError(
      "INSUFFICIENT_FEE",
      `Paid ${amountPaid.toString()} wei, fee is ${fee.toString()} wei`,
    );
  }
  validateFeeSplit(split);

  const treasuryAmount = applyBasisPoints(fee, split.treasuryBps);
  return {
    fee,
    treasuryAmount,
    organizerAmount: fee - treasuryAmount,
    refund: amountPaid - fee,
  };
}

export interface PayoutRecipients {
  readonly treasury: Address;
  readonly organizer: Address;
  readonly payer: Address;
}

/**
 * Moves value out of a registry's ledger account.
 *
 * A payout the recipient rejects (or the ledger refuses) surfaces as
 * TRANSFER_FAILED naming the payout's purpose; the caller's transaction
 * then rolls everything back.
 */
export class FeeDistributor {
  constructor(
    private readonly ledger: Ledger,
    private readonly source: Address,
  ) {}

  /**
   * Pay treasury, then organizer, then the refund. Zero amounts are
   * skipped.
   */
  distribute(
    distribution: FeeDistribution,
    recipients: PayoutRecipients,
    correlationId?: string,
  ): void {
    this.payout(recipients.treasury, distribution.treasuryAmount, "treasury", correlationId);
    this.payout(recipients.organizer, distribution.organizerAmount, "organizer", correlationId);
    this.payout(recipients.payer, distribution.refund, "refund", correlationId);
  }

  payout(to: Address, amount: bigint, purpose: PayoutPurpose, correlationId?: string): void {
    if (amount === 0n) {
      return;
    }
    try {
      this.ledger.transfer(this.source, to, amount, {
        memo: purpose,
        ...(correlationId !== undefined ? { correlationId } : {}),
      });
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new CollectibleError(
          "TRANSFER_FAILED",
          `${purpose} payout of ${amount.toString()} wei to ${to} failed: ${err.message}`,
          { purpose, cause: err },
        );
      }
      throw err;
    }
  }
}
