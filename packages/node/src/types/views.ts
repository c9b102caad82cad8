/**
 * Response shapes.
 *
 * JSON has no bigint, so amounts leave the service as decimal strings
 * of wei. Everything else passes through as the registries return it.
 */

import type { AttendanceToken } from "@proofpass/attendance";
import type { CollectibleToken, FeeDistribution } from "@proofpass/collectible";
import type { EventRecord, PairResult } from "@proofpass/coordinator";

export interface EventView extends EventRecord {
  /** null when the event has no capacity limit */
  readonly remainingSpots: number | null;
}

export interface TokenView<T> {
  readonly token: T;
  readonly tokenURI: string;
}

export interface DistributionView {
  readonly fee: string;
  readonly treasuryAmount: string;
  readonly organizerAmount: string;
  readonly refund: string;
}

export interface PairView {
  readonly collectibleId: number;
  readonly attestationId: string;
  readonly distribution: DistributionView;
}

export function eventView(record: EventRecord): EventView {
  return {
    ...record,
    remainingSpots:
      record.maxAttendees === 0 ? null : record.maxAttendees - record.attendeeCount,
  };
}

export function attendanceView(
  token: AttendanceToken,
  tokenURI: string,
): TokenView<AttendanceToken> {
  return { token, tokenURI };
}

export function collectibleView(
  token: CollectibleToken,
  tokenURI: string,
): TokenView<CollectibleToken> {
  return { token, tokenURI };
}

export function distributionView(distribution: FeeDistribution): DistributionView {
  return {
    fee: distribution.fee.toString(),
    treasuryAmount: distribution.treasuryAmount.toString(),
    organizerAmount: distribution.organizerAmount.toString(),
    refund: distribution.refund.toString(),
  };
}

export function pairView(result: PairResult): PairView {
  return {
    collectibleId: result.collectibleId,
    attestationId: result.attestationId,
    distribution: distributionView(result.distribution),
  };
}
