/**
 * @proofpass/attendance — AttendanceTokenRegistry.
 *
 * Owns non-transferable attendance tokens (SBTs).
 *
 * Lifecycle:
 *   issue ──► live ──► voided          (burn-on-upgrade)
 *              └────► live+companion   (retain-on-companion)
 *
 * Rules:
 * - Token ids start at 0, increase strictly and are never reused
 * - At most one token is ever issued per (recipient, eventRef)
 * - Ownership changes only through mint and burn; every transfer or
 *   approval attempt fails with TRANSFER_NOT_ALLOWED
 * - Only the authorized voider may void or mark a token
 * - Issuance is split into an async authorization step (signature
 *   recovery) and a synchronous commit that re-checks everything that
 *   could have changed in between
 */

import type { Address, EventRef } from "@proofpass/types";
import { ZERO_ADDRESS, isEventRef, isZeroRef, sameAddress } from "@proofpass/types";
import { PROOFPASS_EVENTS } from "@proofpass/event-store";
import type { ExecutionRuntime, Revertible } from "@proofpass/runtime";
import { toChecksumAddress, toNonZeroAddress } from "@proofpass/runtime";
import { verifyIssuanceProof } from "./signing.js";
import type {
  AttendanceRegistryConfig,
  AttendanceToken,
  IssuanceFields,
  IssuanceGrant,
  IssuanceMode,
  IssueRequest,
  OwnershipChange,
} from "./types.js";
import { AttendanceError } from "./types.js";

interface RegistryState {
  admin: Address;
  issuer: Address | undefined;
  voider: Address | undefined;
  baseURI: string;
  nextTokenId: number;
  readonly tokens: Map<number, AttendanceToken>;
  /** `${recipient}:${eventRef}` (lowercased) → token id, kept after burns */
  readonly issued: Map<string, number>;
  readonly allowList: Set<string>;
  readonly balances: Map<string, number>;
}

function cloneState(state: RegistryState): RegistryState {
  return {
    ...state,
    tokens: new Map(state.tokens),
    issued: new Map(state.issued),
    allowList: new Set(state.allowList),
    balances: new Map(state.balances),
  };
}

function issuanceKey(recipient: Address, eventRef: EventRef): string {
  return `${recipient.toLowerCase()}:${eventRef.toLowerCase()}`;
}

const URI_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

export class AttendanceTokenRegistry implements Revertible {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly issuanceMode: IssuanceMode;

  private readonly _runtime: ExecutionRuntime;
  private readonly _grants = new WeakSet<IssuanceGrant>();
  private _state: RegistryState;

  constructor(runtime: ExecutionRuntime, config: AttendanceRegistryConfig) {
    this._runtime = runtime;
    this.address = requireAddress(config.address, "registry");
    this.name = config.name ?? "Proofpass Attendance";
    this.symbol = config.symbol ?? "PPA";
    this.issuanceMode = config.issuance.mode;

    const issuer =
      config.issuance.mode === "signature" && config.issuance.issuer !== undefined
        ? requireAddress(config.issuance.issuer, "issuer")
        : undefined;

    this._state = {
      admin: requireAddress(config.admin, "admin"),
      issuer,
      voider: undefined,
      baseURI: config.baseURI ?? "",
      nextTokenId: 0,
      tokens: new Map(),
      issued: new Map(),
      allowList: new Set(),
      balances: new Map(),
    };

    runtime.attach(this);
  }

  checkpoint(): () => void {
    const saved = cloneState(this._state);
    return () => {
      this._state = saved;
    };
  }

  // ─── Issuance ──────────────────────────────────────────────────────────

  /**
   * Validate an issuance request and check the caller's authority.
   * In signature mode this recovers the proof's signer.
   *
   * The returned grant can be committed once.
   */
  async authorizeIssuance(caller: Address, request: IssueRequest): Promise<IssuanceGrant> {
    const fields = this.validateFields(request);
    this.assertNotIssued(fields);

    if (this.issuanceMode === "allow-list") {
      this.assertAllowListed(caller);
      return this.createGrant({ caller, ...fields, mode: "allow-list" });
    }

    const issuer = this._state.issuer;
    if (issuer === undefined) {
      throw new AttendanceError("ISSUER_NOT_CONFIGURED", "No issuer key is configured");
    }
    if (request.proof === undefined) {
      throw new AttendanceError("INVALID_PROOF", "Signature mode requires a proof");
    }
    const valid = await verifyIssuanceProof(fields, request.proof, issuer);
    if (!valid) {
      throw new AttendanceError("INVALID_PROOF", "Proof was not signed by the issuer");
    }

    return this.createGrant({ caller, ...fields, mode: "signature", verifiedIssuer: issuer });
  }

  /**
   * Mint the token described by a grant. Synchronous, so it can run
   * inside a caller's transaction.
   */
  commitIssuance(grant: IssuanceGrant): number {
    if (!this._grants.has(grant)) {
      throw new AttendanceError(
        "GRANT_CONSUMED",
        "Issuance grant was already used or was not issued by this registry",
      );
    }
    this._grants.delete(grant);

    return this._runtime.atomically(() => {
      if (grant.mode === "allow-list") {
        this.assertAllowListed(grant.caller);
      } else {
        const issuer = this._state.issuer;
        if (
          issuer === undefined ||
          grant.verifiedIssuer === undefined ||
          !sameAddress(issuer, grant.verifiedIssuer)
        ) {
          throw new AttendanceError("INVALID_PROOF", "Issuer changed since the proof was checked");
        }
      }
      this.assertNotIssued(grant);

      const tokenId = this.applyOwnershipChange({
        kind: "mint",
        to: grant.recipient,
        eventRef: grant.eventRef,
        metadataURI: grant.metadataURI,
      });

      this._runtime.emit(PROOFPASS_EVENTS.ATTENDANCE_ISSUED, grant.caller, {
        tokenId,
        recipient: grant.recipient,
        eventRef: grant.eventRef,
        metadataURI: grant.metadataURI,
      });
      return tokenId;
    });
  }

  /**
   * authorizeIssuance + commitIssuance.
   */
  async issue(caller: Address, request: IssueRequest): Promise<number> {
    const grant = await this.authorizeIssuance(caller, request);
    return this.commitIssuance(grant);
  }

  // ─── Voider Operations ─────────────────────────────────────────────────

  /**
   * Burn a token. Authorized voider only.
   */
  void(caller: Address, tokenId: number): void {
    this.assertVoider(caller);
    const token = this.requireToken(tokenId);

    this._runtime.atomically(() => {
      this.applyOwnershipChange({ kind: "burn", tokenId });
      this._runtime.emit(PROOFPASS_EVENTS.ATTENDANCE_VOIDED, caller, {
        tokenId,
        owner: token.owner,
      });
    });
  }

  /**
   * Record that a collectible was paired with a token that is kept.
   * Authorized voider only.
   */
  markCompanion(caller: Address, tokenId: number): void {
    this.assertVoider(caller);
    const token = this.requireToken(tokenId);

    this._runtime.atomically(() => {
      this._state.tokens.set(tokenId, { ...token, hasCompanion: true });
      this._runtime.emit(PROOFPASS_EVENTS.ATTENDANCE_COMPANIONED, caller, {
        tokenId,
        collectibleRegistry: caller,
      });
    });
  }

  // ─── Non-transferability ───────────────────────────────────────────────

  transferFrom(_caller: Address, from: Address, to: Address, tokenId: number): void {
    this.applyOwnershipChange({ kind: "transfer", tokenId, from, to });
  }

  safeTransferFrom(
    _caller: Address,
    from: Address,
    to: Address,
    tokenId: number,
    _data?: string,
  ): void {
    this.applyOwnershipChange({ kind: "transfer", tokenId, from, to });
  }

  approve(_caller: Address, _to: Address, tokenId: number): void {
    throw new AttendanceError(
      "TRANSFER_NOT_ALLOWED",
      `Attendance token ${String(tokenId)} cannot be approved for transfer`,
    );
  }

  setApprovalForAll(_caller: Address, _operator: Address, _approved: boolean): void {
    throw new AttendanceError(
      "TRANSFER_NOT_ALLOWED",
      "Attendance tokens cannot be approved for transfer",
    );
  }

  getApproved(_tokenId: number): Address {
    return ZERO_ADDRESS;
  }

  isApprovedForAll(_owner: Address, _operator: Address): boolean {
    return false;
  }

  // ─── Administration ────────────────────────────────────────────────────

  setAllowedIssuer(caller: Address, account: Address, allowed: boolean): void {
    this.assertAdmin(caller);
    this.assertMode("allow-list", "setAllowedIssuer");
    const target = requireAddress(account, "account");

    this._runtime.atomically(() => {
      if (allowed) {
        this._state.allowList.add(target.toLowerCase());
      } else {
        this._state.allowList.delete(target.toLowerCase());
      }
      this._runtime.emit(PROOFPASS_EVENTS.ALLOWLIST_UPDATED, caller, {
        account: target,
        allowed,
      });
    });
  }

  setIssuer(caller: Address, issuer: Address): void {
    this.assertAdmin(caller);
    this.assertMode("signature", "setIssuer");
    const target = requireAddress(issuer, "issuer");

    this._runtime.atomically(() => {
      this._state.issuer = target;
      this._runtime.emit(PROOFPASS_EVENTS.ISSUER_UPDATED, caller, { issuer: target });
    });
  }

  setAuthorizedVoider(caller: Address, voider: Address): void {
    this.assertAdmin(caller);
    const target = requireAddress(voider, "voider");

    this._runtime.atomically(() => {
      this._state.voider = target;
      this._runtime.emit(PROOFPASS_EVENTS.VOIDER_UPDATED, caller, { voider: target });
    });
  }

  setBaseURI(caller: Address, baseURI: string): void {
    this.assertAdmin(caller);

    this._runtime.atomically(() => {
      this._state.baseURI = baseURI;
      this._runtime.emit(PROOFPASS_EVENTS.ATTENDANCE_BASE_URI_UPDATED, caller, { baseURI });
    });
  }

  transferAdmin(caller: Address, newAdmin: Address): void {
    this.assertAdmin(caller);
    const target = requireAddress(newAdmin, "admin");
    const previousAdmin = this._state.admin;

    this._runtime.atomically(() => {
      this._state.admin = target;
      this._runtime.emit(PROOFPASS_EVENTS.ATTENDANCE_ADMIN_TRANSFERRED, caller, {
        previousAdmin,
        newAdmin: target,
      });
    });
  }

  // ─── Queries ───────────────────────────────────────────────────────────

  ownerOf(tokenId: number): Address {
    return this.requireToken(tokenId).owner;
  }

  getToken(tokenId: number): AttendanceToken | undefined {
    return this._state.tokens.get(tokenId);
  }

  exists(tokenId: number): boolean {
    return this._state.tokens.has(tokenId);
  }

  balanceOf(owner: Address): number {
    return this._state.balances.get(owner.toLowerCase()) ?? 0;
  }

  tokensOf(owner: Address): readonly AttendanceToken[] {
    return [...this._state.tokens.values()].filter((token) =>
      sameAddress(token.owner, owner),
    );
  }

  /**
   * The token's metadata URI, prefixed with the base URI when one is set
   * and the stored URI has no scheme of its own.
   */
  tokenURI(tokenId: number): string {
    const { metadataURI } = this.requireToken(tokenId);
    const base = this._state.baseURI;
    return base !== "" && !URI_SCHEME.test(metadataURI) ? base + metadataURI : metadataURI;
  }

  /**
   * True iff `caller` owns the token. No approvals exist for these
   * tokens; false for tokens that do not exist.
   */
  isApprovedOrOwner(caller: Address, tokenId: number): boolean {
    const token = this._state.tokens.get(tokenId);
    return token !== undefined && sameAddress(token.owner, caller);
  }

  /** Live token held by `holder` for `eventRef`, if any. */
  tokenOf(holder: Address, eventRef: EventRef): number | undefined {
    const tokenId = this._state.issued.get(issuanceKey(holder, eventRef));
    return tokenId !== undefined && this._state.tokens.has(tokenId) ? tokenId : undefined;
  }

  /** Whether a token was ever issued to `holder` for `eventRef`. */
  hasIssued(holder: Address, eventRef: EventRef): boolean {
    return this._state.issued.has(issuanceKey(holder, eventRef));
  }

  /** The id the next issued token will receive. */
  currentTokenId(): number {
    return this._state.nextTokenId;
  }

  totalLive(): number {
    return this._state.tokens.size;
  }

  isAllowedIssuer(account: Address): boolean {
    return this._state.allowList.has(account.toLowerCase());
  }

  issuer(): Address | undefined {
    return this._state.issuer;
  }

  authorizedVoider(): Address | undefined {
    return this._state.voider;
  }

  admin(): Address {
    return this._state.admin;
  }

  baseURI(): string {
    return this._state.baseURI;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * The single entry point for ownership changes.
   * Returns the affected token id.
   */
  private applyOwnershipChange(change: OwnershipChange): number {
    const state = this._state;

    switch (change.kind) {
      case "mint": {
        const tokenId = state.nextTokenId++;
        state.tokens.set(tokenId, {
          tokenId,
          owner: change.to,
          eventRef: change.eventRef,
          metadataURI: change.metadataURI,
          issuedAt: this._runtime.unixTime(),
          hasCompanion: false,
        });
        state.issued.set(issuanceKey(change.to, change.eventRef), tokenId);
        adjustBalance(state.balances, change.to, 1);
        return tokenId;
      }
      case "burn": {
        const token = this.requireToken(change.tokenId);
        state.tokens.delete(change.tokenId);
        adjustBalance(state.balances, token.owner, -1);
        return change.tokenId;
      }
      case "transfer":
        throw new AttendanceError(
          "TRANSFER_NOT_ALLOWED",
          `Attendance token ${String(change.tokenId)} is non-transferable`,
        );
      default: {
        const unreachable: never = change;
        return unreachable;
      }
    }
  }

  private validateFields(request: IssueRequest): IssuanceFields {
    const recipient = toNonZeroAddress(request.recipient);
    if (recipient === undefined) {
      throw new AttendanceError("INVALID_RECIPIENT", "Recipient must be a non-zero address");
    }
    if (request.metadataURI.length === 0) {
      throw new AttendanceError("EMPTY_METADATA_URI", "Metadata URI cannot be empty");
    }
    if (!isEventRef(request.eventRef) || isZeroRef(request.eventRef)) {
      throw new AttendanceError("INVALID_EVENT_REF", "Event reference must be a non-zero bytes32");
    }
    return { recipient, eventRef: request.eventRef, metadataURI: request.metadataURI };
  }

  private createGrant(grant: IssuanceGrant): IssuanceGrant {
    const frozen = Object.freeze({ ...grant });
    this._grants.add(frozen);
    return frozen;
  }

  private assertNotIssued(fields: Pick<IssuanceFields, "recipient" | "eventRef">): void {
    if (this.hasIssued(fields.recipient, fields.eventRef)) {
      throw new AttendanceError(
        "DUPLICATE_ISSUANCE",
        `${fields.recipient} already holds an attendance token for ${fields.eventRef}`,
      );
    }
  }

  private assertAllowListed(caller: Address): void {
    if (!this.isAllowedIssuer(caller)) {
      throw new AttendanceError("UNAUTHORIZED", `${caller} is not an allow-listed issuer`);
    }
  }

  private assertAdmin(caller: Address): void {
    if (!sameAddress(caller, this._state.admin)) {
      throw new AttendanceError("UNAUTHORIZED", `${caller} is not the registry admin`);
    }
  }

  private assertVoider(caller: Address): void {
    const voider = this._state.voider;
    if (voider === undefined || !sameAddress(caller, voider)) {
      throw new AttendanceError("UNAUTHORIZED", `${caller} is not the authorized voider`);
    }
  }

  private assertMode(mode: IssuanceMode, operation: string): void {
    if (this.issuanceMode !== mode) {
      throw new AttendanceError(
        "ISSUANCE_MODE_MISMATCH",
        `${operation} is only available in ${mode} mode; this registry uses ${this.issuanceMode}`,
      );
    }
  }

  private requireToken(tokenId: number): AttendanceToken {
    const token = this._state.tokens.get(tokenId);
    if (token === undefined) {
      throw new AttendanceError("NOT_FOUND", `Attendance token ${String(tokenId)} does not exist`);
    }
    return token;
  }
}

function requireAddress(value: Address, role: string): Address {
  const address = toNonZeroAddress(value);
  if (address === undefined) {
    throw new AttendanceError("INVALID_ADDRESS", `Invalid ${role} address: "${value}"`);
  }
  return address;
}

function adjustBalance(balances: Map<string, number>, owner: Address, delta: number): void {
  const key = owner.toLowerCase();
  balances.set(key, (balances.get(key) ?? 0) + delta);
}
