/**
 * Tests for CollectibleTokenRegistry.
 *
 * Covers:
 * - Pairing effects and fee payouts (burn and companion variants)
 * - Precondition order
 * - Payout failure rollback and re-entrant pairing
 * - canPair diagnostics
 * - Transfers and approvals
 * - Administration
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ExecutionRuntime } from "@proofpass/runtime";
import { parseNative } from "@proofpass/ledger";
import { ZERO_ADDRESS } from "@proofpass/types";
import { AttendanceTokenRegistry } from "@proofpass/attendance";
import { CollectibleTokenRegistry } from "../src/registry.js";
import { CollectibleError } from "../src/types.js";
import type { PairRequest, UpgradeVariant } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2025-06-15T10:00:00.000Z";

const ADMIN = "0x1111111111111111111111111111111111111111";
const TREASURY = "0x2222222222222222222222222222222222222222";
const ORGANIZER = "0x3333333333333333333333333333333333333333";
const USER = "0x4444444444444444444444444444444444444444";
const BOB = "0x5555555555555555555555555555555555555555";
const CAROL = "0x6666666666666666666666666666666666666666";
const ATTENDANCE = "0x7777777777777777777777777777777777777777";
const COLLECTIBLE = "0x8888888888888888888888888888888888888888";

const EVENT_REF = `0x${"0a".repeat(32)}` as const;
const FEE = 10_000_000_000_000_000n;
const ONE_ETHER = parseNative("1");

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof CollectibleError) return err.code;
    if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
    throw err;
  }
  return undefined;
}

interface Fixture {
  readonly runtime: ExecutionRuntime;
  readonly attendance: AttendanceTokenRegistry;
  readonly collectible: CollectibleTokenRegistry;
}

async function setup(variant: UpgradeVariant = "burn"): Promise<Fixture> {
  const runtime = new ExecutionRuntime({ clock: () => new Date(TS) });
  const attendance = new AttendanceTokenRegistry(runtime, {
    address: ATTENDANCE,
    admin: ADMIN,
    issuance: { mode: "allow-list" },
  });
  const collectible = new CollectibleTokenRegistry(runtime, {
    address: COLLECTIBLE,
    admin: ADMIN,
    treasury: TREASURY,
    attendance,
    fee: FEE,
    variant,
  });
  attendance.setAllowedIssuer(ADMIN, ADMIN, true);
  attendance.setAuthorizedVoider(ADMIN, COLLECTIBLE);
  await attendance.issue(ADMIN, { recipient: USER, eventRef: EVENT_REF, metadataURI: "m1" });
  runtime.ledger.fund(USER, ONE_ETHER);
  return { runtime, attendance, collectible };
}

function pairRequest(overrides: Partial<PairRequest> = {}): PairRequest {
  return {
    attendanceTokenId: 0,
    organizer: ORGANIZER,
    payer: USER,
    amountPaid: FEE,
    ...overrides,
  };
}

// ─── Pairing ─────────────────────────────────────────────────────────────

describe("CollectibleTokenRegistry.pair", () => {
  let runtime: ExecutionRuntime;
  let attendance: AttendanceTokenRegistry;
  let collectible: CollectibleTokenRegistry;

  beforeEach(async () => {
    ({ runtime, attendance, collectible } = await setup());
  });

  it("mints a collectible and splits the fee", () => {
    const receipt = collectible.pair(pairRequest());

    expect(receipt).toEqual({
      collectibleId: 0,
      attendanceTokenId: 0,
      payer: USER,
      organizer: ORGANIZER,
      distribution: {
        fee: FEE,
        treasuryAmount: 3_750_000_000_000_000n,
        organizerAmount: 6_250_000_000_000_000n,
        refund: 0n,
      },
    });
    expect(collectible.ownerOf(0)).toBe(USER);
    expect(collectible.balanceOf(USER)).toBe(1);
    expect(collectible.isPaired(0)).toBe(true);
    expect(collectible.collectibleFor(0)).toBe(0);
    expect(collectible.getToken(0)?.createdAt).toBe(1749981600);

    const ledger = runtime.ledger;
    expect(ledger.balanceOf(USER)).toBe(ONE_ETHER - FEE);
    expect(ledger.balanceOf(TREASURY)).toBe(3_750_000_000_000_000n);
    expect(ledger.balanceOf(ORGANIZER)).toBe(6_250_000_000_000_000n);
    expect(collectible.contractBalance()).toBe(0n);
    expect(ledger.verifyConservation().balanced).toBe(true);
  });

  it("burns the attendance token in the burn variant", () => {
    collectible.pair(pairRequest());
    expect(attendance.exists(0)).toBe(false);
    expect(attendance.balanceOf(USER)).toBe(0);
  });

  it("refunds an overpayment so the payer's net outflow is the fee", () => {
    const receipt = collectible.pair(pairRequest({ amountPaid: FEE + 12_345n }));
    expect(receipt.distribution.refund).toBe(12_345n);
    expect(runtime.ledger.balanceOf(USER)).toBe(ONE_ETHER - FEE);
    expect(runtime.ledger.balanceOf(TREASURY) + runtime.ledger.balanceOf(ORGANIZER)).toBe(FEE);
  });

  it("emits paired and fee-distributed events under one correlation id", () => {
    collectible.pair(pairRequest());
    const events = runtime.eventStore.read("collectible");

    expect(events.map((e) => e.event.type)).toEqual([
      "collectible.token.paired",
      "collectible.fee.distributed",
    ]);
    expect(events[0]?.event.payload).toEqual({
      payer: USER,
      attendanceTokenId: 0,
      collectibleId: 0,
      feeCharged: "10000000000000000",
    });
    expect(events[1]?.event.payload).toEqual({
      organizer: ORGANIZER,
      treasuryAmount: "3750000000000000",
      organizerAmount: "6250000000000000",
      refund: "0",
    });

    const correlationId = events[0]?.event.metadata.correlationId ?? "";
    expect(events[1]?.event.metadata.correlationId).toBe(correlationId);
    expect(runtime.ledger.getEntriesByCorrelation(correlationId)).toHaveLength(6);

    const voided = runtime.eventStore.read("attendance", { direction: "backward", maxCount: 1 });
    expect(voided[0]?.event.type).toBe("attendance.token.voided");
    expect(voided[0]?.event.metadata.correlationId).toBe(correlationId);
  });

  it("pairs each attendance token at most once", () => {
    collectible.pair(pairRequest());
    expect(codeOf(() => collectible.pair(pairRequest()))).toBe("ALREADY_PAIRED");
    expect(codeOf(() => collectible.pair(pairRequest({ organizer: BOB, amountPaid: FEE * 2n })))).toBe(
      "ALREADY_PAIRED",
    );
    expect(collectible.collectibleFor(0)).toBe(0);
    expect(collectible.totalSupply()).toBe(1);
  });

  describe("preconditions", () => {
    it("checks the organizer first", () => {
      expect(
        codeOf(() => collectible.pair(pairRequest({ organizer: ZERO_ADDRESS, amountPaid: 0n }))),
      ).toBe("INVALID_ORGANIZER");
    });

    it("checks the fee before pairing status", () => {
      collectible.pair(pairRequest());
      expect(codeOf(() => collectible.pair(pairRequest({ amountPaid: FEE - 1n })))).toBe(
        "INSUFFICIENT_FEE",
      );
    });

    it("checks ownership before the pause", () => {
      collectible.pause(ADMIN);
      expect(codeOf(() => collectible.pair(pairRequest({ payer: BOB })))).toBe("NOT_OWNER");
      expect(codeOf(() => collectible.pair(pairRequest()))).toBe("PAUSED");
    });

    it("treats a missing attendance token as not owned", () => {
      expect(codeOf(() => collectible.pair(pairRequest({ attendanceTokenId: 9 })))).toBe(
        "NOT_OWNER",
      );
    });

    it("leaves no trace when the fee is short", () => {
      expect(codeOf(() => collectible.pair(pairRequest({ amountPaid: FEE - 1n })))).toBe(
        "INSUFFICIENT_FEE",
      );
      expect(collectible.currentTokenId()).toBe(0);
      expect(collectible.isPaired(0)).toBe(false);
      expect(runtime.ledger.balanceOf(USER)).toBe(ONE_ETHER);
      expect(codeOf(() => attendance.transferFrom(USER, USER, BOB, 0))).toBe(
        "TRANSFER_NOT_ALLOWED",
      );
      expect(attendance.ownerOf(0)).toBe(USER);
    });

    it("propagates a payer without enough balance", () => {
      runtime.ledger.transfer(USER, BOB, ONE_ETHER);
      expect(codeOf(() => collectible.pair(pairRequest()))).toBe("INSUFFICIENT_BALANCE");
      expect(collectible.isPaired(0)).toBe(false);
      expect(attendance.exists(0)).toBe(true);
    });
  });

  describe("payout failures", () => {
    it("rolls everything back when the organizer rejects its share", () => {
      runtime.ledger.openAccount(ORGANIZER, {
        onReceive: () => {
          throw new Error("no thanks");
        },
      });

      let caught: unknown;
      try {
        collectible.pair(pairRequest());
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(CollectibleError);
      if (caught instanceof CollectibleError) {
        expect(caught.code).toBe("TRANSFER_FAILED");
        expect(caught.purpose).toBe("organizer");
      }
      expect(collectible.isPaired(0)).toBe(false);
      expect(collectible.currentTokenId()).toBe(0);
      expect(collectible.balanceOf(USER)).toBe(0);
      expect(attendance.exists(0)).toBe(true);
      expect(runtime.ledger.balanceOf(USER)).toBe(ONE_ETHER);
      expect(runtime.ledger.balanceOf(TREASURY)).toBe(0n);
      expect(runtime.eventStore.streamExists("collectible")).toBe(false);
    });

    it("fails the whole pairing when the refund is rejected", async () => {
      await attendance.issue(ADMIN, { recipient: CAROL, eventRef: EVENT_REF, metadataURI: "m2" });
      runtime.ledger.openAccount(CAROL, {
        onReceive: () => {
          throw new Error("no refunds");
        },
      });
      runtime.ledger.fund(CAROL, ONE_ETHER);

      let caught: unknown;
      try {
        collectible.pair(pairRequest({ attendanceTokenId: 1, payer: CAROL, amountPaid: FEE + 1n }));
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(CollectibleError);
      if (caught instanceof CollectibleError) {
        expect(caught.purpose).toBe("refund");
      }
      expect(collectible.isPaired(1)).toBe(false);

      collectible.pair(pairRequest({ attendanceTokenId: 1, payer: CAROL }));
      expect(collectible.ownerOf(0)).toBe(CAROL);
    });
  });

  it("shows a re-entrant pairing the token as already paired", () => {
    const observed: string[] = [];
    runtime.ledger.openAccount(ORGANIZER, {
      onReceive: () => {
        try {
          collectible.pair(pairRequest());
        } catch (err) {
          if (err instanceof CollectibleError) observed.push(err.code);
        }
      },
    });

    collectible.pair(pairRequest());

    expect(observed).toEqual(["ALREADY_PAIRED"]);
    expect(collectible.totalSupply()).toBe(1);
    expect(runtime.ledger.balanceOf(USER)).toBe(ONE_ETHER - FEE);
  });
});

// ─── Companion variant ───────────────────────────────────────────────────

describe("CollectibleTokenRegistry (companion variant)", () => {
  it("keeps and flags the attendance token", async () => {
    const { attendance, collectible } = await setup("companion");
    collectible.pair(pairRequest());

    expect(attendance.ownerOf(0)).toBe(USER);
    expect(attendance.getToken(0)?.hasCompanion).toBe(true);
    expect(codeOf(() => collectible.pair(pairRequest()))).toBe("ALREADY_PAIRED");
    expect(codeOf(() => attendance.transferFrom(USER, USER, BOB, 0))).toBe("TRANSFER_NOT_ALLOWED");
  });
});

// ─── canPair ─────────────────────────────────────────────────────────────

describe("CollectibleTokenRegistry.canPair", () => {
  it("reports each blocking condition", async () => {
    const { collectible } = await setup();

    expect(collectible.canPair(0, USER)).toEqual({ canPair: true, reason: "can pair" });
    expect(collectible.canPair(0, BOB)).toEqual({ canPair: false, reason: "not owner" });

    collectible.pause(ADMIN);
    expect(collectible.canPair(0, USER)).toEqual({ canPair: false, reason: "paused" });

    collectible.unpause(ADMIN);
    collectible.pair(pairRequest());
    expect(collectible.canPair(0, USER)).toEqual({ canPair: false, reason: "already paired" });
  });
});

// ─── Transfers ───────────────────────────────────────────────────────────

describe("CollectibleTokenRegistry transfers", () => {
  let runtime: ExecutionRuntime;
  let collectible: CollectibleTokenRegistry;

  beforeEach(async () => {
    ({ runtime, collectible } = await setup());
    collectible.pair(pairRequest());
  });

  it("lets the owner transfer", () => {
    collectible.transferFrom(USER, USER, BOB, 0);
    expect(collectible.ownerOf(0)).toBe(BOB);
    expect(collectible.balanceOf(USER)).toBe(0);
    expect(collectible.balanceOf(BOB)).toBe(1);

    const last = runtime.eventStore.read("collectible", { direction: "backward", maxCount: 1 })[0];
    expect(last?.event.payload).toEqual({ tokenId: 0, from: USER, to: BOB });
  });

  it("lets an approved address transfer once", () => {
    collectible.approve(USER, BOB, 0);
    expect(collectible.getApproved(0)).toBe(BOB);

    collectible.transferFrom(BOB, USER, CAROL, 0);
    expect(collectible.ownerOf(0)).toBe(CAROL);
    expect(collectible.getApproved(0)).toBe(ZERO_ADDRESS);
    expect(codeOf(() => collectible.transferFrom(BOB, CAROL, BOB, 0))).toBe("UNAUTHORIZED");
  });

  it("lets an operator transfer and approve", () => {
    collectible.setApprovalForAll(USER, BOB, true);
    expect(collectible.isApprovedForAll(USER, BOB)).toBe(true);
    collectible.approve(BOB, CAROL, 0);
    collectible.safeTransferFrom(CAROL, USER, CAROL, 0);
    expect(collectible.ownerOf(0)).toBe(CAROL);
  });

  it("rejects bad transfers", () => {
    expect(codeOf(() => collectible.transferFrom(BOB, USER, BOB, 0))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.transferFrom(USER, BOB, CAROL, 0))).toBe("NOT_OWNER");
    expect(codeOf(() => collectible.transferFrom(USER, USER, ZERO_ADDRESS, 0))).toBe(
      "INVALID_RECIPIENT",
    );
    expect(codeOf(() => collectible.transferFrom(USER, USER, BOB, 5))).toBe("NOT_FOUND");
    expect(codeOf(() => collectible.approve(BOB, CAROL, 0))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.setApprovalForAll(USER, USER, true))).toBe("INVALID_ADDRESS");
    expect(codeOf(() => collectible.getApproved(5))).toBe("NOT_FOUND");
  });
});

// ─── Administration ──────────────────────────────────────────────────────

describe("CollectibleTokenRegistry administration", () => {
  let runtime: ExecutionRuntime;
  let collectible: CollectibleTokenRegistry;

  beforeEach(async () => {
    ({ runtime, collectible } = await setup());
  });

  it("restricts configuration to the admin", () => {
    expect(codeOf(() => collectible.setFee(USER, 1n))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.setTreasury(USER, BOB))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.setFeeSplit(USER, { treasuryBps: 1, organizerBps: 9999 }))).toBe(
      "UNAUTHORIZED",
    );
    expect(codeOf(() => collectible.pause(USER))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.emergencyWithdraw(USER))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.setBaseURI(USER, "x"))).toBe("UNAUTHORIZED");
    expect(codeOf(() => collectible.transferAdmin(USER, USER))).toBe("UNAUTHORIZED");
  });

  it("updates the fee and records it", () => {
    collectible.setFee(ADMIN, 20_000_000_000_000_000n);
    expect(collectible.fee()).toBe(20_000_000_000_000_000n);
    const last = runtime.eventStore.read("collectible", { direction: "backward", maxCount: 1 })[0];
    expect(last?.event.payload).toEqual({ field: "fee", value: "20000000000000000" });
    expect(codeOf(() => collectible.setFee(ADMIN, -1n))).toBe("INVALID_FEE");
  });

  it("validates treasury and split updates", () => {
    expect(codeOf(() => collectible.setTreasury(ADMIN, ZERO_ADDRESS))).toBe("INVALID_ADDRESS");
    expect(
      codeOf(() => collectible.setFeeSplit(ADMIN, { treasuryBps: 3000, organizerBps: 4000 })),
    ).toBe("INVALID_SPLIT");
    expect(
      codeOf(() => collectible.setFeeSplit(ADMIN, { treasuryBps: 0, organizerBps: 10_000 })),
    ).toBe("INVALID_SPLIT");
    expect(collectible.feeSplit()).toEqual({ treasuryBps: 3750, organizerBps: 6250 });
  });

  it("applies a new split and treasury to later pairings", () => {
    collectible.setFeeSplit(ADMIN, { treasuryBps: 5000, organizerBps: 5000 });
    collectible.setTreasury(ADMIN, CAROL);
    collectible.pair(pairRequest());
    expect(runtime.ledger.balanceOf(CAROL)).toBe(5_000_000_000_000_000n);
    expect(runtime.ledger.balanceOf(ORGANIZER)).toBe(5_000_000_000_000_000n);
    expect(runtime.ledger.balanceOf(TREASURY)).toBe(0n);
  });

  it("pauses and unpauses once each", () => {
    collectible.pause(ADMIN);
    expect(collectible.isPaused()).toBe(true);
    expect(codeOf(() => collectible.pause(ADMIN))).toBe("PAUSED");
    collectible.unpause(ADMIN);
    expect(codeOf(() => collectible.unpause(ADMIN))).toBe("NOT_PAUSED");
  });

  it("withdraws stray deposits to the admin", () => {
    expect(codeOf(() => collectible.emergencyWithdraw(ADMIN))).toBe("NOTHING_TO_WITHDRAW");

    runtime.ledger.transfer(USER, COLLECTIBLE, 100n);
    expect(collectible.contractBalance()).toBe(100n);
    expect(collectible.emergencyWithdraw(ADMIN)).toBe(100n);
    expect(runtime.ledger.balanceOf(ADMIN)).toBe(100n);
    expect(collectible.contractBalance()).toBe(0n);
  });

  it("falls back to base URI + id", () => {
    collectible.pair(pairRequest());
    expect(collectible.tokenURI(0)).toBe("");
    collectible.setBaseURI(ADMIN, "https://collectibles.example/");
    expect(collectible.tokenURI(0)).toBe("https://collectibles.example/0");
  });

  it("rejects an attendance registry at the zero address", () => {
    const port = {
      address: ZERO_ADDRESS,
      isApprovedOrOwner: () => false,
      void: () => undefined,
      markCompanion: () => undefined,
    };
    expect(codeOf(() => collectible.setAttendanceRegistry(ADMIN, port))).toBe("INVALID_ADDRESS");
    expect(collectible.attendanceRegistry()).toBe(ATTENDANCE);
  });

  it("hands over administration", () => {
    collectible.transferAdmin(ADMIN, BOB);
    expect(collectible.admin()).toBe(BOB);
    expect(codeOf(() => collectible.pause(ADMIN))).toBe("UNAUTHORIZED");
  });
});
