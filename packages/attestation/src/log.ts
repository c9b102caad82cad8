/**
 * @proofpass/attestation — AttestationLog.
 *
 * Append-only. Records are never changed or removed; each is indexed
 * by holder and by event. Only the admin (the coordinator, once
 * deployed) may record.
 */

import type { Address, EventRef, Hex } from "@proofpass/types";
import { isEventRef, isZeroRef, sameAddress } from "@proofpass/types";
import { PROOFPASS_EVENTS } from "@proofpass/event-store";
import type { ExecutionRuntime, Revertible } from "@proofpass/runtime";
import { toNonZeroAddress } from "@proofpass/runtime";
import { computeAttestationId } from "./attestation-id.js";
import type {
  Attestation,
  AttestationBatch,
  AttestationInput,
  AttestationLogConfig,
} from "./types.js";
import { AttestationError } from "./types.js";

interface LogState {
  admin: Address;
  /** In sequence order; the sequence of a record is its position. */
  readonly records: Attestation[];
  readonly byId: Map<string, Attestation>;
  readonly byHolder: Map<string, Hex[]>;
  readonly byEvent: Map<string, Hex[]>;
}

function pushIndex(index: Map<string, Hex[]>, key: string, id: Hex): void {
  const ids = index.get(key);
  if (ids === undefined) {
    index.set(key, [id]);
  } else {
    ids.push(id);
  }
}

/** Drops the last id under `key`, which is the most recent append. */
function popIndex(index: Map<string, Hex[]>, key: string): void {
  const ids = index.get(key);
  ids?.pop();
  if (ids?.length === 0) {
    index.delete(key);
  }
}

export class AttestationLog implements Revertible {
  readonly address: Address;

  private readonly _runtime: ExecutionRuntime;
  private readonly _state: LogState;

  constructor(runtime: ExecutionRuntime, config: AttestationLogConfig) {
    this._runtime = runtime;
    this.address = requireAddress(config.address, "log");
    this._state = {
      admin: requireAddress(config.admin, "admin"),
      records: [],
      byId: new Map(),
      byHolder: new Map(),
      byEvent: new Map(),
    };
    runtime.attach(this);
  }

  /**
   * Records are append-only, so restoring means dropping whatever was
   * appended after the checkpoint, newest first.
   */
  checkpoint(): () => void {
    const state = this._state;
    const { admin } = state;
    const length = state.records.length;
    return () => {
      state.admin = admin;
      while (state.records.length > length) {
        const record = state.records.pop();
        if (record === undefined) break;
        state.byId.delete(record.attestationId);
        popIndex(state.byHolder, record.holder.toLowerCase());
        popIndex(state.byEvent, record.eventRef.toLowerCase());
      }
    };
  }

  // ─── Writes ────────────────────────────────────────────────────────────

  record(caller: Address, input: AttestationInput): Hex {
    this.assertAdmin(caller);
    const validated = validate(input);
    return this._runtime.atomically(() => this.append(caller, validated));
  }

  /**
   * Record several attestations at once. Array lengths and every entry
   * are checked before anything is written.
   */
  batchRecord(caller: Address, batch: AttestationBatch): readonly Hex[] {
    this.assertAdmin(caller);

    const count = batch.eventRefs.length;
    if (
      batch.holders.length !== count ||
      batch.tokenIds.length !== count ||
      batch.isUpgrade.length !== count
    ) {
      throw new AttestationError(
        "ARRAY_LENGTH_MISMATCH",
        `Batch arrays differ in length: ${String(count)} event refs, ${String(batch.holders.length)} holders, ` +
          `${String(batch.tokenIds.length)} token ids, ${String(batch.isUpgrade.length)} upgrade flags`,
      );
    }

    const inputs: AttestationInput[] = [];
    batch.eventRefs.forEach((eventRef, i) => {
      inputs.push(
        validate({
          eventRef,
          holder: batch.holders[i] ?? "0x",
          tokenId: batch.tokenIds[i] ?? 0,
          isUpgrade: batch.isUpgrade[i] ?? false,
        }),
      );
    });

    return this._runtime.atomically(() => inputs.map((input) => this.append(caller, input)));
  }

  transferAdmin(caller: Address, newAdmin: Address): void {
    this.assertAdmin(caller);
    const target = requireAddress(newAdmin, "admin");
    const previousAdmin = this._state.admin;

    this._runtime.atomically(() => {
      this._state.admin = target;
      this._runtime.emit(PROOFPASS_EVENTS.ATTESTATION_ADMIN_TRANSFERRED, caller, {
        previousAdmin,
        newAdmin: target,
      });
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  /**
   * Throws NOT_FOUND for unknown ids.
   */
  get(attestationId: string): Attestation {
    const record = this.find(attestationId);
    if (record === undefined) {
      throw new AttestationError("NOT_FOUND", `Attestation ${attestationId} does not exist`);
    }
    return record;
  }

  find(attestationId: string): Attestation | undefined {
    return this._state.byId.get(attestationId.toLowerCase());
  }

  idsForHolder(holder: Address): readonly Hex[] {
    return [...(this._state.byHolder.get(holder.toLowerCase()) ?? [])];
  }

  idsForEvent(eventRef: EventRef): readonly Hex[] {
    return [...(this._state.byEvent.get(eventRef.toLowerCase()) ?? [])];
  }

  listForHolder(holder: Address): readonly Attestation[] {
    return this.resolve(this.idsForHolder(holder));
  }

  listForEvent(eventRef: EventRef): readonly Attestation[] {
    return this.resolve(this.idsForEvent(eventRef));
  }

  countForHolder(holder: Address): number {
    return this._state.byHolder.get(holder.toLowerCase())?.length ?? 0;
  }

  countForEvent(eventRef: EventRef): number {
    return this._state.byEvent.get(eventRef.toLowerCase())?.length ?? 0;
  }

  /** Scans the holder's attestations. */
  hasAttended(holder: Address, eventRef: EventRef): boolean {
    const ref = eventRef.toLowerCase();
    return this.listForHolder(holder).some((record) => record.eventRef.toLowerCase() === ref);
  }

  upgradesForHolder(holder: Address): readonly Attestation[] {
    return this.listForHolder(holder).filter((record) => record.isUpgrade);
  }

  get size(): number {
    return this._state.records.length;
  }

  admin(): Address {
    return this._state.admin;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private append(caller: Address, input: AttestationInput): Hex {
    const state = this._state;
    const sequence = state.records.length;
    const attestationId = computeAttestationId(input, sequence);
    const record: Attestation = {
      ...input,
      attestationId,
      sequence,
      createdAt: this._runtime.unixTime(),
    };

    state.records.push(record);
    state.byId.set(attestationId, record);
    pushIndex(state.byHolder, input.holder.toLowerCase(), attestationId);
    pushIndex(state.byEvent, input.eventRef.toLowerCase(), attestationId);

    this._runtime.emit(PROOFPASS_EVENTS.ATTESTATION_RECORDED, caller, {
      attestationId,
      eventRef: input.eventRef,
      holder: input.holder,
      tokenId: input.tokenId,
      isUpgrade: input.isUpgrade,
    });
    return attestationId;
  }

  private resolve(ids: readonly Hex[]): readonly Attestation[] {
    return ids.flatMap((id) => {
      const record = this._state.byId.get(id);
      return record === undefined ? [] : [record];
    });
  }

  private assertAdmin(caller: Address): void {
    if (!sameAddress(caller, this._state.admin)) {
      throw new AttestationError("UNAUTHORIZED", `${caller} may not record attestations`);
    }
  }
}

function validate(input: AttestationInput): AttestationInput {
  if (!isEventRef(input.eventRef) || isZeroRef(input.eventRef)) {
    throw new AttestationError("INVALID_EVENT_REF", "Event reference must be a non-zero bytes32");
  }
  const holder = toNonZeroAddress(input.holder);
  if (holder === undefined) {
    throw new AttestationError("INVALID_HOLDER", "Holder must be a non-zero address");
  }
  if (!Number.isSafeInteger(input.tokenId) || input.tokenId < 0) {
    throw new AttestationError(
      "INVALID_TOKEN_ID",
      `Token id must be a non-negative integer, got ${String(input.tokenId)}`,
    );
  }
  return {
    eventRef: input.eventRef,
    holder,
    tokenId: input.tokenId,
    isUpgrade: input.isUpgrade,
  };
}

function requireAddress(value: Address, role: string): Address {
  const address = toNonZeroAddress(value);
  if (address === undefined) {
    throw new AttestationError("INVALID_ADDRESS", `Invalid ${role} address: "${value}"`);
  }
  return address;
}
