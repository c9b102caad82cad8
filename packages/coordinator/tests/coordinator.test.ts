/**
 * Tests for EventCoordinator event lifecycle and queries.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZERO_ADDRESS, ZERO_REF } from "@proofpass/types";
import type { Address } from "@proofpass/types";
import { PROOFPASS_EVENTS } from "@proofpass/event-store";
import { AttestationLog } from "@proofpass/attestation";
import type { EventCoordinator } from "../src/coordinator.js";
import { deploymentAddresses } from "../src/deployment.js";
import type { Deployment } from "../src/deployment.js";
import { deriveEventRef } from "../src/event-ref.js";
import { CoordinatorError } from "../src/types.js";
import type { CreateEventInput } from "../src/types.js";
import {
  BOB,
  CREATOR,
  DEPLOYER,
  TS_UNIX,
  USER,
  asyncCodeOf,
  codeOf,
  deploy,
  wallet,
} from "./helpers.js";

const LEGACY_A = `0x${"a1".repeat(32)}` as const;
const LEGACY_B = `0x${"b2".repeat(32)}` as const;

function eventInput(overrides: Partial<CreateEventInput> = {}): CreateEventInput {
  return {
    name: "DevCon",
    description: "Annual developer conference",
    imageRef: "ipfs://devcon/cover.png",
    maxAttendees: 10,
    ...overrides,
  };
}

describe("EventCoordinator", () => {
  let deployment: Deployment;
  let coordinator: EventCoordinator;

  beforeEach(() => {
    deployment = deploy();
    coordinator = deployment.coordinator;
  });

  describe("createEvent", () => {
    it("derives the ref and records the event", () => {
      const ref = coordinator.createEvent(CREATOR, eventInput());

      expect(ref).toBe(deriveEventRef(CREATOR, "DevCon", 0));
      expect(coordinator.getEvent(ref)).toEqual({
        eventRef: ref,
        name: "DevCon",
        description: "Annual developer conference",
        imageRef: "ipfs://devcon/cover.png",
        creator: CREATOR,
        active: true,
        createdAt: TS_UNIX,
        attendeeCount: 0,
        maxAttendees: 10,
        metadata: "",
        legacy: false,
      });
      expect(coordinator.getRemainingSpots(ref)).toBe(10);
    });

    it("gives repeated names distinct refs", () => {
      const first = coordinator.createEvent(CREATOR, eventInput());
      const second = coordinator.createEvent(CREATOR, eventInput());
      expect(second).not.toBe(first);
      expect(second).toBe(deriveEventRef(CREATOR, "DevCon", 1));
    });

    it("emits coordinator.event.created", () => {
      const ref = coordinator.createEvent(CREATOR, eventInput({ maxAttendees: 0 }));
      const [stored] = deployment.runtime.eventStore.read("events");
      expect(stored?.event.metadata.actor).toBe(CREATOR);
      expect(stored?.event.payload).toEqual({
        eventRef: ref,
        creator: CREATOR,
        name: "DevCon",
        description: "Annual developer conference",
        imageRef: "ipfs://devcon/cover.png",
        maxAttendees: 0,
      });
    });

    it("validates required fields and capacity", () => {
      expect(codeOf(() => coordinator.createEvent(CREATOR, eventInput({ name: "  " })))).toBe(
        "EMPTY_NAME",
      );
      expect(codeOf(() => coordinator.createEvent(CREATOR, eventInput({ imageRef: "" })))).toBe(
        "EMPTY_IMAGE_REF",
      );
      expect(codeOf(() => coordinator.createEvent(CREATOR, eventInput({ maxAttendees: -1 })))).toBe(
        "INVALID_CAPACITY",
      );
      expect(codeOf(() => coordinator.createEvent(CREATOR, eventInput({ maxAttendees: 1.5 })))).toBe(
        "INVALID_CAPACITY",
      );
      expect(coordinator.listEvents()).toEqual([]);
    });
  });

  describe("updateEvent / setEventStatus", () => {
    let ref: `0x${string}`;

    beforeEach(() => {
      ref = coordinator.createEvent(CREATOR, eventInput());
    });

    it("lets the creator edit descriptive fields", () => {
      coordinator.updateEvent(CREATOR, ref, {
        name: "DevCon 2",
        description: "",
        imageRef: "ipfs://devcon/2.png",
      });
      const record = coordinator.getEvent(ref);
      expect(record?.name).toBe("DevCon 2");
      expect(record?.description).toBe("");
      expect(record?.maxAttendees).toBe(10);
    });

    it("rejects other callers, unknown events and blank fields", () => {
      const update = { name: "x", description: "", imageRef: "y" };
      expect(codeOf(() => coordinator.updateEvent(BOB, ref, update))).toBe("NOT_CREATOR");
      expect(codeOf(() => coordinator.updateEvent(CREATOR, LEGACY_A, update))).toBe(
        "EVENT_NOT_REGISTERED",
      );
      expect(codeOf(() => coordinator.updateEvent(CREATOR, ref, { ...update, name: "" }))).toBe(
        "EMPTY_NAME",
      );
      expect(codeOf(() => coordinator.setEventStatus(BOB, ref, false))).toBe("NOT_CREATOR");
      expect(codeOf(() => coordinator.setEventStatus(CREATOR, LEGACY_A, false))).toBe(
        "EVENT_NOT_REGISTERED",
      );
    });

    it("toggles the active flag both ways", async () => {
      coordinator.setEventStatus(CREATOR, ref, false);
      expect(coordinator.getEvent(ref)?.active).toBe(false);
      expect(
        await asyncCodeOf(() =>
          coordinator.mintWithAttestation(DEPLOYER, {
            recipient: USER,
            metadataURI: "m1",
            eventRef: ref,
          }),
        ),
      ).toBe("EVENT_NOT_ACTIVE");

      coordinator.setEventStatus(CREATOR, ref, true);
      const result = await coordinator.mintWithAttestation(DEPLOYER, {
        recipient: USER,
        metadataURI: "m1",
        eventRef: ref,
      });
      expect(result.tokenId).toBe(0);
    });

    it("attaches the event to coordinator errors", () => {
      let caught: unknown;
      try {
        coordinator.setEventStatus(BOB, ref, false);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(CoordinatorError);
      if (caught instanceof CoordinatorError) {
        expect(caught.eventRef).toBe(ref);
        expect(caught.kind).toBe("authorization");
      }
    });
  });

  describe("admin registration", () => {
    it("registers an event with metadata", () => {
      coordinator.registerEvent(DEPLOYER, LEGACY_A, "Sample Event");
      expect(coordinator.isRegistered(LEGACY_A)).toBe(true);
      expect(coordinator.getEventMetadata(LEGACY_A)).toBe("Sample Event");
      expect(coordinator.getEvent(LEGACY_A)?.legacy).toBe(true);
      expect(coordinator.getRemainingSpots(LEGACY_A)).toBeNull();
    });

    it("rejects non-admins, zero refs and duplicates", () => {
      expect(codeOf(() => coordinator.registerEvent(BOB, LEGACY_A, "x"))).toBe("UNAUTHORIZED");
      expect(codeOf(() => coordinator.registerEvent(DEPLOYER, ZERO_REF, "x"))).toBe(
        "INVALID_EVENT_REF",
      );
      coordinator.registerEvent(DEPLOYER, LEGACY_A, "x");
      expect(codeOf(() => coordinator.registerEvent(DEPLOYER, LEGACY_A, "y"))).toBe(
        "EVENT_ALREADY_REGISTERED",
      );
      expect(codeOf(() => coordinator.getEventMetadata(LEGACY_B))).toBe("EVENT_NOT_REGISTERED");
    });

    it("registers batches all-or-nothing", () => {
      coordinator.batchRegisterEvents(DEPLOYER, [LEGACY_A, LEGACY_B], ["A", "B"]);
      expect(coordinator.getEventMetadata(LEGACY_B)).toBe("B");

      const fresh = deploy().coordinator;
      expect(codeOf(() => fresh.batchRegisterEvents(DEPLOYER, [LEGACY_A], ["A", "B"]))).toBe(
        "ARRAY_LENGTH_MISMATCH",
      );
      expect(
        codeOf(() => fresh.batchRegisterEvents(DEPLOYER, [LEGACY_A, LEGACY_A], ["A", "B"])),
      ).toBe("EVENT_ALREADY_REGISTERED");
      expect(fresh.isRegistered(LEGACY_A)).toBe(false);
      expect(codeOf(() => fresh.batchRegisterEvents(BOB, [], []))).toBe("UNAUTHORIZED");
    });
  });

  describe("queries", () => {
    it("lists events in registration order and by creator", () => {
      const first = coordinator.createEvent(CREATOR, eventInput());
      coordinator.registerEvent(DEPLOYER, LEGACY_A, "legacy");
      const third = coordinator.createEvent(CREATOR, eventInput({ name: "Meetup" }));

      expect(coordinator.listEvents().map((e) => e.eventRef)).toEqual([first, LEGACY_A, third]);
      expect(coordinator.eventsByCreator(CREATOR).map((e) => e.eventRef)).toEqual([first, third]);
      expect(coordinator.eventsByCreator(BOB)).toEqual([]);
    });

    it("reports the wired contract addresses", () => {
      const addresses = coordinator.contractAddresses();
      expect(addresses).toEqual(deploymentAddresses(DEPLOYER));
      expect(new Set(Object.values(addresses)).size).toBe(4);
      expect(deployment.addresses).toEqual(addresses);
    });
  });

  describe("deployment wiring", () => {
    it("connects the components", () => {
      const { attendance, attestation, collectible } = deployment;
      expect(attendance.authorizedVoider()).toBe(collectible.address);
      expect(attendance.isAllowedIssuer(coordinator.address)).toBe(true);
      expect(attestation.admin()).toBe(coordinator.address);
      expect(collectible.fee()).toBe(10_000_000_000_000_000n);
      expect(coordinator.admin()).toBe(DEPLOYER);
    });

    it("hands over coordinator administration", () => {
      coordinator.transferAdmin(DEPLOYER, BOB);
      expect(coordinator.admin()).toBe(BOB);
      expect(codeOf(() => coordinator.registerEvent(DEPLOYER, LEGACY_A, "x"))).toBe("UNAUTHORIZED");
    });
  });

  describe("updateContracts", () => {
    class UnplacedLog extends AttestationLog {
      override readonly address: Address = ZERO_ADDRESS;
    }

    function replacementLog(): AttestationLog {
      return new AttestationLog(deployment.runtime, {
        address: wallet(0x77),
        admin: coordinator.address,
      });
    }

    it("routes later operations to the new registries", async () => {
      const log = replacementLog();
      coordinator.updateContracts(DEPLOYER, {
        attendance: deployment.attendance,
        collectible: deployment.collectible,
        attestation: log,
      });

      expect(coordinator.attestation).toBe(log);
      expect(coordinator.contractAddresses().attestation).toBe(wallet(0x77));

      const ref = coordinator.createEvent(CREATOR, eventInput());
      await coordinator.mintWithAttestation(DEPLOYER, {
        recipient: USER,
        metadataURI: "m1",
        eventRef: ref,
      });
      expect(log.countForHolder(USER)).toBe(1);
      expect(deployment.attestation.countForHolder(USER)).toBe(0);
    });

    it("emits the new addresses", () => {
      coordinator.updateContracts(DEPLOYER, {
        attendance: deployment.attendance,
        collectible: deployment.collectible,
        attestation: replacementLog(),
      });

      const last = deployment.runtime.eventStore.readAll().at(-1);
      expect(last?.event.type).toBe(PROOFPASS_EVENTS.CONTRACTS_UPDATED);
      expect(last?.event.payload).toEqual({
        attendance: deployment.attendance.address,
        collectible: deployment.collectible.address,
        attestation: wallet(0x77),
      });
    });

    it("is admin only", () => {
      expect(
        codeOf(() =>
          coordinator.updateContracts(USER, {
            attendance: deployment.attendance,
            collectible: deployment.collectible,
            attestation: replacementLog(),
          }),
        ),
      ).toBe("UNAUTHORIZED");
      expect(coordinator.attestation).toBe(deployment.attestation);
    });

    it("rejects a registry at the zero address", () => {
      const unplaced = new UnplacedLog(deployment.runtime, {
        address: wallet(0x78),
        admin: coordinator.address,
      });
      expect(
        codeOf(() =>
          coordinator.updateContracts(DEPLOYER, {
            attendance: deployment.attendance,
            collectible: deployment.collectible,
            attestation: unplaced,
          }),
        ),
      ).toBe("INVALID_ADDRESS");
      expect(coordinator.attestation).toBe(deployment.attestation);
    });
  });
});
