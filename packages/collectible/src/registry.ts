/**
 * @proofpass/collectible — CollectibleTokenRegistry.
 *
 * Owns the transferable collectibles and runs the paid pairing
 * operation that turns an attendance token into one.
 *
 * pair() checks, in order: organizer, fee, already paired, ownership,
 * paused. It then marks the attendance token paired, mints, settles
 * the attendance token (void or mark companion), takes the payment and
 * pays treasury, organizer and refund. State is fully updated before
 * the first payout, so a payout recipient that re-enters sees the token
 * as paired. Any failure rolls back the whole operation.
 */

import type { Address } from "@proofpass/types";
import { ZERO_ADDRESS, isZeroAddress, sameAddress } from "@proofpass/types";
import { PROOFPASS_EVENTS } from "@proofpass/event-store";
import type { ExecutionRuntime, Revertible } from "@proofpass/runtime";
import { toChecksumAddress, toNonZeroAddress } from "@proofpass/runtime";
import {
  DEFAULT_FEE_SPLIT,
  FeeDistributor,
  computeFeeDistribution,
  validateFeeSplit,
} from "./fee-distributor.js";
import type {
  AttendanceRegistryPort,
  CanPairResult,
  CollectibleRegistryConfig,
  CollectibleToken,
  FeeSplit,
  PairReceipt,
  PairRequest,
  UpgradeVariant,
} from "./types.js";
import { CollectibleError } from "./types.js";

interface RegistryState {
  admin: Address;
  treasury: Address;
  attendance: AttendanceRegistryPort;
  fee: bigint;
  split: FeeSplit;
  paused: boolean;
  baseURI: string;
  nextTokenId: number;
  readonly tokens: Map<number, CollectibleToken>;
  readonly balances: Map<string, number>;
  readonly approvals: Map<number, Address>;
  /** `${owner}:${operator}` (lowercased) */
  readonly operators: Set<string>;
  /** attendance token id → collectible id */
  readonly pairings: Map<number, number>;
}

function cloneState(state: RegistryState): RegistryState {
  return {
    ...state,
    tokens: new Map(state.tokens),
    balances: new Map(state.balances),
    approvals: new Map(state.approvals),
    operators: new Set(state.operators),
    pairings: new Map(state.pairings),
  };
}

function operatorKey(owner: Address, operator: Address): string {
  return `${owner.toLowerCase()}:${operator.toLowerCase()}`;
}

export class CollectibleTokenRegistry implements Revertible {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly variant: UpgradeVariant;

  private readonly _runtime: ExecutionRuntime;
  private readonly _distributor: FeeDistributor;
  private _state: RegistryState;

  constructor(runtime: ExecutionRuntime, config: CollectibleRegistryConfig) {
    this._runtime = runtime;
    this.address = requireAddress(config.address, "registry");
    this.name = config.name ?? "Proofpass Collectible";
    this.symbol = config.symbol ?? "PPC";
    this.variant = config.variant ?? "burn";

    if (config.fee < 0n) {
      throw new CollectibleError("INVALID_FEE", `Fee cannot be negative: ${config.fee.toString()}`);
    }
    const split = config.split ?? DEFAULT_FEE_SPLIT;
    validateFeeSplit(split);

    this._state = {
      admin: requireAddress(config.admin, "admin"),
      treasury: requireAddress(config.treasury, "treasury"),
      attendance: requirePort(config.attendance),
      fee: config.fee,
      split,
      paused: false,
      baseURI: config.baseURI ?? "",
      nextTokenId: 0,
      tokens: new Map(),
      balances: new Map(),
      approvals: new Map(),
      operators: new Set(),
      pairings: new Map(),
    };

    // Plain deposits are accepted; emergencyWithdraw() recovers them.
    if (!runtime.ledger.hasAccount(this.address)) {
      runtime.ledger.openAccount(this.address, { kind: "contract", label: this.name });
    }
    this._distributor = new FeeDistributor(runtime.ledger, this.address);
    runtime.attach(this);
  }

  checkpoint(): () => void {
    const saved = cloneState(this._state);
    return () => {
      this._state = saved;
    };
  }

  // ─── Pairing ───────────────────────────────────────────────────────────

  /**
   * Pair an attendance token with a new collectible minted to the payer.
   * The payer's ledger account funds `amountPaid`.
   */
  pair(request: PairRequest): PairReceipt {
    const { attendanceTokenId, amountPaid } = request;
    const state = this._state;

    const organizer = toNonZeroAddress(request.organizer);
    if (organizer === undefined) {
      throw new CollectibleError("INVALID_ORGANIZER", "Organizer must be a non-zero address");
    }
    if (amountPaid < state.fee) {
      throw new CollectibleError(
        "INSUFFICIENT_FEE",
        `Paid ${amountPaid.toString()} wei, fee is ${state.fee.toString()} wei`,
      );
    }
    if (state.pairings.has(attendanceTokenId)) {
      throw new CollectibleError(
        "ALREADY_PAIRED",
        `Attendance token ${String(attendanceTokenId)} is already paired`,
      );
    }
    const payer = toNonZeroAddress(request.payer);
    if (payer === undefined || !state.attendance.isApprovedOrOwner(payer, attendanceTokenId)) {
      throw new CollectibleError(
        "NOT_OWNER",
        `${request.payer} does not own attendance token ${String(attendanceTokenId)}`,
      );
    }
    if (state.paused) {
      throw new CollectibleError("PAUSED", "Pairing is paused");
    }

    return this._runtime.atomically(() => {
      const collectibleId = this._state.nextTokenId++;
      this._state.pairings.set(attendanceTokenId, collectibleId);
      this.mint(payer, collectibleId, attendanceTokenId);

      const attendance = this._state.attendance;
      if (this.variant === "burn") {
        attendance.void(this.address, attendanceTokenId);
      } else {
        attendance.markCompanion(this.address, attendanceTokenId);
      }

      const distribution = computeFeeDistribution(this._state.fee, this._state.split, amountPaid);
      const correlationId = this._runtime.correlationId;

      if (amountPaid > 0n) {
        this._runtime.ledger.transfer(payer, this.address, amountPaid, {
          memo: "pairing payment",
          ...(correlationId !== undefined ? { correlationId } : {}),
        });
      }
      this._distributor.distribute(
        distribution,
        { treasury: this._state.treasury, organizer, payer },
        correlationId,
      );

      this._runtime.emit(PROOFPASS_EVENTS.COLLECTIBLE_PAIRED, payer, {
        payer,
        attendanceTokenId,
        collectibleId,
        feeCharged: distribution.fee.toString(),
      });
      this._runtime.emit(PROOFPASS_EVENTS.FEE_DISTRIBUTED, payer, {
        organizer,
        treasuryAmount: distribution.treasuryAmount.toString(),
        organizerAmount: distribution.organizerAmount.toString(),
        refund: distribution.refund.toString(),
      });

      return { collectibleId, attendanceTokenId, payer, organizer, distribution };
    });
  }

  /**
   * Pre-flight check for pair(). Never throws.
   */
  canPair(attendanceTokenId: number, caller: Address): CanPairResult {
    const state = this._state;
    if (state.pairings.has(attendanceTokenId)) {
      return { canPair: false, reason: "already paired" };
    }
    if (!state.attendance.isApprovedOrOwner(caller, attendanceTokenId)) {
      return { canPair: false, reason: "not owner" };
    }
    if (state.paused) {
      return { canPair: false, reason: "paused" };
    }
    return { canPair: true, reason: "can pair" };
  }

  // ─── Transfers ─────────────────────────────────────────────────────────

  approve(caller: Address, to: Address, tokenId: number): void {
    const token = this.requireToken(tokenId);
    if (!sameAddress(caller, token.owner) && !this.isApprovedForAll(token.owner, caller)) {
      throw new CollectibleError(
        "UNAUTHORIZED",
        `${caller} is neither the owner of collectible ${String(tokenId)} nor an approved operator`,
      );
    }

    const approved = toChecksumAddress(to);
    if (approved === undefined) {
      throw new CollectibleError("INVALID_ADDRESS", `Invalid approval address: "${to}"`);
    }

    this._runtime.atomically(() => {
      if (isZeroAddress(approved)) {
        this._state.approvals.delete(tokenId);
      } else {
        this._state.approvals.set(tokenId, approved);
      }
      this._runtime.emit(PROOFPASS_EVENTS.APPROVAL_UPDATED, caller, {
        owner: token.owner,
        operator: approved,
        tokenId,
        approved: !isZeroAddress(approved),
      });
    });
  }

  getApproved(tokenId: number): Address {
    this.requireToken(tokenId);
    return this._state.approvals.get(tokenId) ?? ZERO_ADDRESS;
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    const target = toNonZeroAddress(operator);
    if (target === undefined || sameAddress(caller, target)) {
      throw new CollectibleError("INVALID_ADDRESS", `Invalid operator address: "${operator}"`);
    }

    this._runtime.atomically(() => {
      const key = operatorKey(caller, target);
      if (approved) {
        this._state.operators.add(key);
      } else {
        this._state.operators.delete(key);
      }
      this._runtime.emit(PROOFPASS_EVENTS.APPROVAL_UPDATED, caller, {
        owner: caller,
        operator: target,
        approved,
      });
    });
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this._state.operators.has(operatorKey(owner, operator));
  }

  transferFrom(caller: Address, from: Address, to: Address, tokenId: number): void {
    const token = this.requireToken(tokenId);
    if (!this.isApprovedOrOwner(caller, tokenId)) {
      throw new CollectibleError(
        "UNAUTHORIZED",
        `${caller} may not transfer collectible ${String(tokenId)}`,
      );
    }
    if (!sameAddress(from, token.owner)) {
      throw new CollectibleError("NOT_OWNER", `${from} does not own collectible ${String(tokenId)}`);
    }
    const recipient = toNonZeroAddress(to);
    if (recipient === undefined) {
      throw new CollectibleError("INVALID_RECIPIENT", "Recipient must be a non-zero address");
    }

    this._runtime.atomically(() => {
      const state = this._state;
      state.approvals.delete(tokenId);
      state.tokens.set(tokenId, { ...token, owner: recipient });
      adjustBalance(state.balances, token.owner, -1);
      adjustBalance(state.balances, recipient, 1);
      this._runtime.emit(PROOFPASS_EVENTS.COLLECTIBLE_TRANSFERRED, caller, {
        tokenId,
        from: token.owner,
        to: recipient,
      });
    });
  }

  /**
   * Same as transferFrom(); recipients are ledger accounts, so there is
   * no receiver interface to call.
   */
  safeTransferFrom(
    caller: Address,
    from: Address,
    to: Address,
    tokenId: number,
    _data?: string,
  ): void {
    this.transferFrom(caller, from, to, tokenId);
  }

  // ─── Administration ────────────────────────────────────────────────────

  setFee(caller: Address, fee: bigint): void {
    this.assertAdmin(caller);
    if (fee < 0n) {
      throw new CollectibleError("INVALID_FEE", `Fee cannot be negative: ${fee.toString()}`);
    }
    this.updateConfig(caller, "fee", fee.toString(), (state) => {
      state.fee = fee;
    });
  }

  setTreasury(caller: Address, treasury: Address): void {
    this.assertAdmin(caller);
    const target = requireAddress(treasury, "treasury");
    this.updateConfig(caller, "treasury", target, (state) => {
      state.treasury = target;
    });
  }

  setFeeSplit(caller: Address, split: FeeSplit): void {
    this.assertAdmin(caller);
    validateFeeSplit(split);
    const value = `${String(split.treasuryBps)}/${String(split.organizerBps)}`;
    this.updateConfig(caller, "feeSplit", value, (state) => {
      state.split = { treasuryBps: split.treasuryBps, organizerBps: split.organizerBps };
    });
  }

  setBaseURI(caller: Address, baseURI: string): void {
    this.assertAdmin(caller);
    this.updateConfig(caller, "baseURI", baseURI, (state) => {
      state.baseURI = baseURI;
    });
  }

  setAttendanceRegistry(caller: Address, attendance: AttendanceRegistryPort): void {
    this.assertAdmin(caller);
    const port = requirePort(attendance);
    this.updateConfig(caller, "attendanceRegistry", port.address, (state) => {
      state.attendance = port;
    });
  }

  pause(caller: Address): void {
    this.assertAdmin(caller);
    if (this._state.paused) {
      throw new CollectibleError("PAUSED", "Pairing is already paused");
    }
    this._runtime.atomically(() => {
      this._state.paused = true;
      this._runtime.emit(PROOFPASS_EVENTS.PAUSED, caller, { by: caller });
    });
  }

  unpause(caller: Address): void {
    this.assertAdmin(caller);
    if (!this._state.paused) {
      throw new CollectibleError("NOT_PAUSED", "Pairing is not paused");
    }
    this._runtime.atomically(() => {
      this._state.paused = false;
      this._runtime.emit(PROOFPASS_EVENTS.UNPAUSED, caller, { by: caller });
    });
  }

  /**
   * Send the registry's whole balance to the admin.
   */
  emergencyWithdraw(caller: Address): bigint {
    this.assertAdmin(caller);
    const amount = this.contractBalance();
    if (amount === 0n) {
      throw new CollectibleError("NOTHING_TO_WITHDRAW", "Registry balance is zero");
    }

    const to = this._state.admin;
    this._runtime.atomically(() => {
      this._distributor.payout(to, amount, "withdrawal", this._runtime.correlationId);
      this._runtime.emit(PROOFPASS_EVENTS.FUNDS_WITHDRAWN, caller, {
        to,
        amount: amount.toString(),
      });
    });
    return amount;
  }

  transferAdmin(caller: Address, newAdmin: Address): void {
    this.assertAdmin(caller);
    const target = requireAddress(newAdmin, "admin");
    const previousAdmin = this._state.admin;

    this._runtime.atomically(() => {
      this._state.admin = target;
      this._runtime.emit(PROOFPASS_EVENTS.COLLECTIBLE_ADMIN_TRANSFERRED, caller, {
        previousAdmin,
        newAdmin: target,
      });
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  ownerOf(tokenId: number): Address {
    return this.requireToken(tokenId).owner;
  }

  getToken(tokenId: number): CollectibleToken | undefined {
    return this._state.tokens.get(tokenId);
  }

  exists(tokenId: number): boolean {
    return this._state.tokens.has(tokenId);
  }

  balanceOf(owner: Address): number {
    return this._state.balances.get(owner.toLowerCase()) ?? 0;
  }

  tokensOf(owner: Address): readonly CollectibleToken[] {
    return [...this._state.tokens.values()].filter((token) => sameAddress(token.owner, owner));
  }

  /**
   * The token's own URI, or base URI + id when it has none.
   */
  tokenURI(tokenId: number): string {
    const token = this.requireToken(tokenId);
    if (token.metadataURI !== "") {
      return token.metadataURI;
    }
    return this._state.baseURI === "" ? "" : `${this._state.baseURI}${String(tokenId)}`;
  }

  isApprovedOrOwner(caller: Address, tokenId: number): boolean {
    const token = this._state.tokens.get(tokenId);
    if (token === undefined) {
      return false;
    }
    const approved = this._state.approvals.get(tokenId);
    return (
      sameAddress(caller, token.owner) ||
      (approved !== undefined && sameAddress(caller, approved)) ||
      this.isApprovedForAll(token.owner, caller)
    );
  }

  isPaired(attendanceTokenId: number): boolean {
    return this._state.pairings.has(attendanceTokenId);
  }

  /** Collectible minted from `attendanceTokenId`, if it was paired. */
  collectibleFor(attendanceTokenId: number): number | undefined {
    return this._state.pairings.get(attendanceTokenId);
  }

  currentTokenId(): number {
    return this._state.nextTokenId;
  }

  totalSupply(): number {
    return this._state.tokens.size;
  }

  /** Wei held by the registry's own ledger account. */
  contractBalance(): bigint {
    return this._runtime.ledger.balanceOf(this.address);
  }

  fee(): bigint {
    return this._state.fee;
  }

  feeSplit(): FeeSplit {
    return this._state.split;
  }

  treasury(): Address {
    return this._state.treasury;
  }

  isPaused(): boolean {
    return this._state.paused;
  }

  admin(): Address {
    return this._state.admin;
  }

  baseURI(): string {
    return this._state.baseURI;
  }

  attendanceRegistry(): Address {
    return this._state.attendance.address;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private mint(to: Address, tokenId: number, attendanceTokenId: number): void {
    this._state.tokens.set(tokenId, {
      tokenId,
      owner: to,
      attendanceTokenId,
      metadataURI: "",
      createdAt: this._runtime.unixTime(),
    });
    adjustBalance(this._state.balances, to, 1);
  }

  private updateConfig(
    caller: Address,
    field: string,
    value: string,
    apply: (state: RegistryState) => void,
  ): void {
    this._runtime.atomically(() => {
      apply(this._state);
      this._runtime.emit(PROOFPASS_EVENTS.CONFIG_UPDATED, caller, { field, value });
    });
  }

  private assertAdmin(caller: Address): void {
    if (!sameAddress(caller, this._state.admin)) {
      throw new CollectibleError("UNAUTHORIZED", `${caller} is not the registry admin`);
    }
  }

  private requireToken(tokenId: number): CollectibleToken {
    const token = this._state.tokens.get(tokenId);
    if (token === undefined) {
      throw new CollectibleError("NOT_FOUND", `Collectible ${String(tokenId)} does not exist`);
    }
    return token;
  }
}

function requireAddress(value: Address, role: string): Address {
  const address = toNonZeroAddress(value);
  if (address === undefined) {
    throw new CollectibleError("INVALID_ADDRESS", `Invalid ${role} address: "${value}"`);
  }
  return address;
}

function requirePort(port: AttendanceRegistryPort): AttendanceRegistryPort {
  requireAddress(port.address, "attendance registry");
  return port;
}

function adjustBalance(balances: Map<string, number>, owner: Address, delta: number): void {
  const key = owner.toLowerCase();
  balances.set(key, (balances.get(key) ?? 0) + delta);
}
