/**
 * @proofpass/demo — Scenario.
 *
 * One event from creation to upgrade, on a fresh deployment:
 * deploy → create event → mint → blocked transfer → pair →
 * blocked second pairing → history → integrity.
 *
 * The scenario reports through a Reporter so the CLI can render it and
 * tests can record it.
 */

import type { Address, EventRef } from "@proofpass/types";
import { createDeployment } from "@proofpass/coordinator";
import type { ContractAddresses } from "@proofpass/coordinator";
import type { FeeDistribution } from "@proofpass/collectible";
import { formatNative, parseNative } from "@proofpass/ledger";

export interface Reporter {
  step(title: string): void;
  ok(message: string): void;
  info(label: string, value: string): void;
  blocked(message: string): void;
}

export interface ScenarioOptions {
  readonly variant?: "burn" | "companion" | undefined;

  /** Paid on top of the fee and refunded. Defaults to 0.005. */
  readonly overpayment?: bigint | undefined;
  readonly clock?: (() => Date) | undefined;
}

export interface ScenarioSummary {
  readonly addresses: ContractAddresses;
  readonly eventRef: EventRef;
  readonly attendanceTokens: readonly number[];
  readonly collectibleId: number;
  readonly distribution: FeeDistribution;
  readonly aliceAttestations: number;
  readonly blocked: readonly string[];
  readonly eventCount: number;
  readonly chainValid: boolean;
  readonly balanced: boolean;
}

export const ACTORS = {
  deployer: "0x1000000000000000000000000000000000000001",
  treasury: "0x1000000000000000000000000000000000000002",
  organizer: "0x1000000000000000000000000000000000000003",
  alice: "0x1000000000000000000000000000000000000004",
  bob: "0x1000000000000000000000000000000000000005",
} as const satisfies Record<string, Address>;

export const SCENARIO_STEPS = [
  "Deploy",
  "Create event",
  "Mint attendance tokens",
  "Try to transfer",
  "Pair with a collectible",
  "Try to pair again",
  "Attendance history",
  "Integrity",
] as const;

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  throw new Error("Expected the operation to be rejected");
}

export async function runScenario(
  reporter: Reporter,
  options: ScenarioOptions = {},
): Promise<ScenarioSummary> {
  const { deployer, treasury, organizer, alice, bob } = ACTORS;
  let stepIndex = 0;
  const next = (): void => reporter.step(SCENARIO_STEPS[stepIndex++] ?? "");
  const blocked: string[] = [];

  next();
  const d = createDeployment({
    deployer,
    treasury,
    issuance: { mode: "allow-list" },
    variant: options.variant,
    runtime: options.clock !== undefined ? { clock: options.clock } : undefined,
  });
  reporter.ok(`Deployed (${d.collectible.variant} variant)`);
  reporter.info("attendance", d.addresses.attendance);
  reporter.info("collectible", d.addresses.collectible);
  reporter.info("attestation", d.addresses.attestation);
  reporter.info("coordinator", d.addresses.coordinator);
  reporter.info("upgrade fee", formatNative(d.collectible.fee()));

  next();
  const eventRef = d.coordinator.createEvent(organizer, {
    name: "Protocol Meetup",
    description: "Monthly meetup",
    imageRef: "ipfs://meetup/cover.png",
    maxAttendees: 100,
  });
  reporter.ok("Event created by the organizer");
  reporter.info("eventRef", eventRef);

  next();
  const attendanceTokens: number[] = [];
  for (const recipient of [alice, bob]) {
    const { tokenId } = await d.coordinator.mintWithAttestation(deployer, {
      recipient,
      metadataURI: `ipfs://meetup/attendee-${String(attendanceTokens.length)}.json`,
      eventRef,
    });
    attendanceTokens.push(tokenId);
    reporter.ok(`Token #${String(tokenId)} minted to ${recipient}`);
  }
  reporter.info("remaining", String(d.coordinator.getRemainingSpots(eventRef)));

  next();
  const transferCode = codeOf(() => d.attendance.transferFrom(alice, alice, bob, 0));
  blocked.push(transferCode);
  reporter.blocked(`Transfer of token #0 rejected: ${transferCode}`);

  next();
  const fee = d.collectible.fee();
  const payment = fee + (options.overpayment ?? parseNative("0.005"));
  d.runtime.ledger.fund(alice, parseNative("1"));
  const paired = d.coordinator.pairWithAttestation(alice, {
    attendanceTokenId: 0,
    organizer,
    eventRef,
    payment,
  });
  reporter.ok(`Collectible #${String(paired.collectibleId)} paired with token #0`);
  reporter.info("treasury", formatNative(paired.distribution.treasuryAmount));
  reporter.info("organizer", formatNative(paired.distribution.organizerAmount));
  reporter.info("refund", formatNative(paired.distribution.refund));
  reporter.info("token #0", d.attendance.exists(0) ? "kept as companion" : "burned");

  next();
  const pairCode = codeOf(() =>
    d.coordinator.pairWithAttestation(alice, { attendanceTokenId: 0, organizer, eventRef, payment }),
  );
  blocked.push(pairCode);
  reporter.blocked(`Second pairing rejected: ${pairCode}`);

  next();
  const history = d.coordinator.getUserAttendanceHistory(alice);
  for (const attestation of history) {
    reporter.info(attestation.isUpgrade ? "upgrade" : "attendance", attestation.attestationId);
  }
  reporter.ok(`Alice attended: ${String(d.coordinator.hasUserAttendedEvent(alice, eventRef))}`);

  next();
  const integrity = d.runtime.eventStore.verifyIntegrity();
  const conservation = d.runtime.ledger.verifyConservation();
  const eventCount = d.runtime.eventStore.readAll().length;
  reporter.ok(`${String(eventCount)} domain events, hash chain valid: ${String(integrity.valid)}`);
  reporter.ok(`Ledger conserves value: ${String(conservation.balanced)}`);

  return {
    addresses: d.addresses,
    eventRef,
    attendanceTokens,
    collectibleId: paired.collectibleId,
    distribution: paired.distribution,
    aliceAttestations: history.length,
    blocked,
    eventCount,
    chainValid: integrity.valid,
    balanced: conservation.balanced,
  };
}
