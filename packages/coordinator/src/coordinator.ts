/**
 * @proofpass/coordinator — EventCoordinator.
 *
 * Owns event registration and lifecycle, and composes the three
 * registries into the two end-to-end operations:
 *
 *   mintWithAttestation: event checks → issue → count attendee → attest
 *   pairWithAttestation: token's event checks → pair (fee split) → attest upgrade
 *
 * Each commits as one transaction. Registry errors propagate unchanged.
 */

import type { Address, EventRef } from "@proofpass/types";
import { isEventRef, isZeroRef, sameAddress } from "@proofpass/types";
import { PROOFPASS_EVENTS } from "@proofpass/event-store";
import type { ExecutionRuntime, Revertible } from "@proofpass/runtime";
import { toNonZeroAddress } from "@proofpass/runtime";
import type { AttendanceTokenRegistry } from "@proofpass/attendance";
import type { CollectibleTokenRegistry } from "@proofpass/collectible";
import type { Attestation, AttestationLog } from "@proofpass/attestation";
import { deriveEventRef } from "./event-ref.js";
import type {
  ContractAddresses,
  CoordinatorContracts,
  CreateEventInput,
  EventRecord,
  MintResult,
  MintWithAttestationInput,
  PairResult,
  PairWithAttestationInput,
  UpdateEventInput,
} from "./types.js";
import { CoordinatorError } from "./types.js";

export interface CoordinatorConfig extends CoordinatorContracts {
  readonly address: Address;
  readonly admin: Address;
}

interface CoordinatorState {
  admin: Address;
  contracts: CoordinatorContracts;
  created: number;
  readonly events: Map<string, EventRecord>;
  /** Registration order; replaced on append. */
  order: readonly EventRef[];
}

export class EventCoordinator implements Revertible {
  readonly address: Address;

  private readonly _runtime: ExecutionRuntime;
  private _state: CoordinatorState;

  constructor(runtime: ExecutionRuntime, config: CoordinatorConfig) {
    this._runtime = runtime;
    this.address = requireAddress(config.address, "coordinator");
    this._state = {
      admin: requireAddress(config.admin, "admin"),
      contracts: requireContracts(config),
      created: 0,
      events: new Map(),
      order: [],
    };
    runtime.attach(this);
  }

  get attendance(): AttendanceTokenRegistry {
    return this._state.contracts.attendance;
  }

  get collectible(): CollectibleTokenRegistry {
    return this._state.contracts.collectible;
  }

  get attestation(): AttestationLog {
    return this._state.contracts.attestation;
  }

  checkpoint(): () => void {
    const saved: CoordinatorState = { ...this._state, events: new Map(this._state.events) };
    return () => {
      this._state = saved;
    };
  }

  // ─── Event Lifecycle ───────────────────────────────────────────────────

  /**
   * Create an event. Anyone may call; the caller becomes its creator.
   */
  createEvent(caller: Address, input: CreateEventInput): EventRef {
    const fields = validateFields(input);
    const { maxAttendees } = input;
    if (!Number.isSafeInteger(maxAttendees) || maxAttendees < 0) {
      throw new CoordinatorError(
        "INVALID_CAPACITY",
        `maxAttendees must be a non-negative integer, got ${String(maxAttendees)}`,
      );
    }

    const creator = requireAddress(caller, "creator");

    return this._runtime.atomically(() => {
      const eventRef = deriveEventRef(creator, fields.name, this._state.created++);
      this.store({
        eventRef,
        ...fields,
        creator,
        active: true,
        createdAt: this._runtime.unixTime(),
        attendeeCount: 0,
        maxAttendees,
        metadata: "",
        legacy: false,
      });
      this._runtime.emit(PROOFPASS_EVENTS.EVENT_CREATED, creator, {
        eventRef,
        creator,
        ...fields,
        maxAttendees,
      });
      return eventRef;
    });
  }

  /**
   * Register an externally chosen event reference. Admin only.
   */
  registerEvent(caller: Address, eventRef: EventRef, metadata: string): void {
    this.assertAdmin(caller);
    this.assertRegistrable(eventRef);
    this._runtime.atomically(() => this.registerLegacy(caller, eventRef, metadata));
  }

  batchRegisterEvents(
    caller: Address,
    eventRefs: readonly EventRef[],
    metadata: readonly string[],
  ): void {
    this.assertAdmin(caller);
    if (eventRefs.length !== metadata.length) {
      throw new CoordinatorError(
        "ARRAY_LENGTH_MISMATCH",
        `${String(eventRefs.length)} event refs but ${String(metadata.length)} metadata entries`,
      );
    }

    this._runtime.atomically(() => {
      eventRefs.forEach((eventRef, i) => {
        this.assertRegistrable(eventRef);
        this.registerLegacy(caller, eventRef, metadata[i] ?? "");
      });
    });
  }

  updateEvent(caller: Address, eventRef: EventRef, input: UpdateEventInput): void {
    const record = this.requireCreator(caller, eventRef);
    const fields = validateFields(input);

    this._runtime.atomically(() => {
      this.store({ ...record, ...fields });
      this._runtime.emit(PROOFPASS_EVENTS.EVENT_UPDATED, caller, {
        eventRef: record.eventRef,
        ...fields,
      });
    });
  }

  setEventStatus(caller: Address, eventRef: EventRef, active: boolean): void {
    const record = this.requireCreator(caller, eventRef);

    this._runtime.atomically(() => {
      this.store({ ...record, active });
      this._runtime.emit(PROOFPASS_EVENTS.EVENT_STATUS_CHANGED, caller, {
        eventRef: record.eventRef,
        active,
      });
    });
  }

  transferAdmin(caller: Address, newAdmin: Address): void {
    this.assertAdmin(caller);
    const target = requireAddress(newAdmin, "admin");
    const previousAdmin = this._state.admin;

    this._runtime.atomically(() => {
      this._state.admin = target;
      this._runtime.emit(PROOFPASS_EVENTS.COORDINATOR_ADMIN_TRANSFERRED, caller, {
        previousAdmin,
        newAdmin: target,
      });
    });
  }

  /**
   * Point the coordinator at different registries. Admin only; every
   * registry must have a non-zero address.
   */
  updateContracts(caller: Address, contracts: CoordinatorContracts): void {
    this.assertAdmin(caller);
    const next = requireContracts(contracts);

    this._runtime.atomically(() => {
      this._state.contracts = next;
      this._runtime.emit(PROOFPASS_EVENTS.CONTRACTS_UPDATED, caller, {
        attendance: next.attendance.address,
        collectible: next.collectible.address,
        attestation: next.attestation.address,
      });
    });
  }

  // ─── End-to-end Operations ─────────────────────────────────────────────

  /**
   * Issue an attendance token for an event and attest it.
   *
   * Allow-list deployments: admin only. Signature deployments: anyone
   * holding a valid issuer proof.
   */
  async mintWithAttestation(caller: Address, input: MintWithAttestationInput): Promise<MintResult> {
    if (this.attendance.issuanceMode === "allow-list") {
      this.assertAdmin(caller);
    }
    this.requireMintable(input.eventRef);

    const grant = await this.attendance.authorizeIssuance(this.address, {
      recipient: input.recipient,
      eventRef: input.eventRef,
      metadataURI: input.metadataURI,
      proof: input.proof,
    });

    return this._runtime.atomically(() => {
      const record = this.requireMintable(input.eventRef);
      const tokenId = this.attendance.commitIssuance(grant);
      this.store({ ...record, attendeeCount: record.attendeeCount + 1 });

      const attestationId = this.attestation.record(this.address, {
        eventRef: record.eventRef,
        holder: grant.recipient,
        tokenId,
        isUpgrade: false,
      });
      this._runtime.emit(PROOFPASS_EVENTS.ATTENDANCE_MINTED, caller, {
        eventRef: record.eventRef,
        recipient: grant.recipient,
        tokenId,
        attestationId,
      });
      return { tokenId, attestationId };
    });
  }

  /**
   * Pair the caller's attendance token with a collectible, paying
   * `payment` from the caller's account, and attest the upgrade.
   *
   * `eventRef` must be the event the token was issued for; the event
   * checks run against that event.
   */
  pairWithAttestation(caller: Address, input: PairWithAttestationInput): PairResult {
    const token = this.attendance.getToken(input.attendanceTokenId);
    if (token !== undefined && token.eventRef.toLowerCase() !== input.eventRef.toLowerCase()) {
      throw new CoordinatorError(
        "EVENT_MISMATCH",
        `Attendance token ${String(input.attendanceTokenId)} belongs to event ${token.eventRef}, not ${input.eventRef}`,
        input.eventRef,
      );
    }
    const record = this.requireActive(token?.eventRef ?? input.eventRef);

    return this._runtime.atomically(() => {
      const receipt = this.collectible.pair({
        attendanceTokenId: input.attendanceTokenId,
        organizer: input.organizer,
        payer: caller,
        amountPaid: input.payment,
      });

      const attestationId = this.attestation.record(this.address, {
        eventRef: record.eventRef,
        holder: receipt.payer,
        tokenId: receipt.collectibleId,
        isUpgrade: true,
      });
      this._runtime.emit(PROOFPASS_EVENTS.COLLECTIBLE_PAIRED_WITH_ATTESTATION, caller, {
        eventRef: record.eventRef,
        payer: receipt.payer,
        attendanceTokenId: receipt.attendanceTokenId,
        collectibleId: receipt.collectibleId,
        attestationId,
      });
      return {
        collectibleId: receipt.collectibleId,
        attestationId,
        distribution: receipt.distribution,
      };
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  getEvent(eventRef: EventRef): EventRecord | undefined {
    return this._state.events.get(eventRef.toLowerCase());
  }

  isRegistered(eventRef: EventRef): boolean {
    return this._state.events.has(eventRef.toLowerCase());
  }

  /** Metadata given on the admin path; empty for created events. */
  getEventMetadata(eventRef: EventRef): string {
    return this.requireEvent(eventRef).metadata;
  }

  /** All events in registration order. */
  listEvents(): readonly EventRecord[] {
    return this._state.order.flatMap((ref) => {
      const record = this.getEvent(ref);
      return record === undefined ? [] : [record];
    });
  }

  eventsByCreator(creator: Address): readonly EventRecord[] {
    return this.listEvents().filter((record) => sameAddress(record.creator, creator));
  }

  /** null when the event has no capacity limit. */
  getRemainingSpots(eventRef: EventRef): number | null {
    const { maxAttendees, attendeeCount } = this.requireEvent(eventRef);
    return maxAttendees === 0 ? null : maxAttendees - attendeeCount;
  }

  getUserAttendanceHistory(user: Address): readonly Attestation[] {
    return this.attestation.listForHolder(user);
  }

  getEventAttendance(eventRef: EventRef): readonly Attestation[] {
    return this.attestation.listForEvent(eventRef);
  }

  hasUserAttendedEvent(user: Address, eventRef: EventRef): boolean {
    return this.attestation.hasAttended(user, eventRef);
  }

  getUserUpgrades(user: Address): readonly Attestation[] {
    return this.attestation.upgradesForHolder(user);
  }

  contractAddresses(): ContractAddresses {
    return {
      attendance: this.attendance.address,
      collectible: this.collectible.address,
      attestation: this.attestation.address,
      coordinator: this.address,
    };
  }

  admin(): Address {
    return this._state.admin;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private store(record: EventRecord): void {
    const key = record.eventRef.toLowerCase();
    if (!this._state.events.has(key)) {
      this._state.order = [...this._state.order, record.eventRef];
    }
    this._state.events.set(key, record);
  }

  private registerLegacy(caller: Address, eventRef: EventRef, metadata: string): void {
    this.store({
      eventRef,
      name: metadata,
      description: "",
      imageRef: "",
      creator: caller,
      active: true,
      createdAt: this._runtime.unixTime(),
      attendeeCount: 0,
      maxAttendees: 0,
      metadata,
      legacy: true,
    });
    this._runtime.emit(PROOFPASS_EVENTS.EVENT_REGISTERED, caller, { eventRef, metadata });
  }

  private assertRegistrable(eventRef: EventRef): void {
    if (!isEventRef(eventRef) || isZeroRef(eventRef)) {
      throw new CoordinatorError("INVALID_EVENT_REF", "Event reference must be a non-zero bytes32");
    }
    if (this.isRegistered(eventRef)) {
      throw new CoordinatorError(
        "EVENT_ALREADY_REGISTERED",
        `Event ${eventRef} is already registered`,
        eventRef,
      );
    }
  }

  private requireEvent(eventRef: EventRef): EventRecord {
    const record = this.getEvent(eventRef);
    if (record === undefined) {
      throw new CoordinatorError(
        "EVENT_NOT_REGISTERED",
        `Event ${eventRef} is not registered`,
        eventRef,
      );
    }
    return record;
  }

  private requireActive(eventRef: EventRef): EventRecord {
    const record = this.requireEvent(eventRef);
    if (!record.active) {
      throw new CoordinatorError("EVENT_NOT_ACTIVE", `Event ${eventRef} is not active`, eventRef);
    }
    return record;
  }

  private requireMintable(eventRef: EventRef): EventRecord {
    const record = this.requireActive(eventRef);
    if (record.maxAttendees > 0 && record.attendeeCount >= record.maxAttendees) {
      throw new CoordinatorError(
        "EVENT_FULL",
        `Event ${eventRef} reached its capacity of ${String(record.maxAttendees)}`,
        eventRef,
      );
    }
    return record;
  }

  private requireCreator(caller: Address, eventRef: EventRef): EventRecord {
    const record = this.requireEvent(eventRef);
    if (!sameAddress(caller, record.creator)) {
      throw new CoordinatorError(
        "NOT_CREATOR",
        `${caller} did not create event ${eventRef}`,
        eventRef,
      );
    }
    return record;
  }

  private assertAdmin(caller: Address): void {
    if (!sameAddress(caller, this._state.admin)) {
      throw new CoordinatorError("UNAUTHORIZED", `${caller} is not the coordinator admin`);
    }
  }
}

function validateFields(input: UpdateEventInput): UpdateEventInput {
  if (input.name.trim() === "") {
    throw new CoordinatorError("EMPTY_NAME", "Event name cannot be empty");
  }
  if (input.imageRef.trim() === "") {
    throw new CoordinatorError("EMPTY_IMAGE_REF", "Event image reference cannot be empty");
  }
  return { name: input.name, description: input.description, imageRef: input.imageRef };
}

function requireContracts(contracts: CoordinatorContracts): CoordinatorContracts {
  requireAddress(contracts.attendance.address, "attendance registry");
  requireAddress(contracts.collectible.address, "collectible registry");
  requireAddress(contracts.attestation.address, "attestation log");
  return {
    attendance: contracts.attendance,
    collectible: contracts.collectible,
    attestation: contracts.attestation,
  };
}

function requireAddress(value: Address, role: string): Address {
  const address = toNonZeroAddress(value);
  if (address === undefined) {
    throw new CoordinatorError("INVALID_ADDRESS", `Invalid ${role} address: "${value}"`);
  }
  return address;
}
