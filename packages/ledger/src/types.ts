/**
 * @proofpass/ledger — Internal types for the value ledger.
 *
 * The ledger is the execution substrate the registries run on:
 * it holds native balances (wei, as bigint) for every address and
 * records every movement of value as a balanced pair of entries.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid transfers throw, never silently succeed
 */

import type { Address } from "@proofpass/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** A plain wallet, or a component (registry) that holds value itself. */
export type AccountKind = "wallet" | "contract";

/**
 * An account known to the ledger.
 * Accounts are opened explicitly or implicitly when they first receive value.
 */
export interface LedgerAccount {
  readonly address: Address;
  readonly kind: AccountKind;
  readonly label?: string | undefined;
  readonly createdAt: string;
}

/**
 * A single movement of value, as seen by the recipient's receive hook.
 */
export interface ValueTransfer {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
  readonly correlationId: string;
  readonly memo?: string | undefined;
}

/**
 * Called synchronously after value lands in an account.
 * Throwing rejects the transfer. Hooks may call back into any component.
 */
export type ReceiveHook = (transfer: ValueTransfer) => void;

export interface OpenAccountOptions {
  readonly kind?: AccountKind | undefined;
  readonly label?: string | undefined;
  readonly onReceive?: ReceiveHook | undefined;
}

// ─── Entry Types ─────────────────────────────────────────────────────────

/**
 * Entry direction from the account holder's point of view:
 * debit = value left the account, credit = value arrived.
 */
export type EntryType = "debit" | "credit";

/**
 * One line of the ledger. Every transfer writes exactly one debit
 * and one credit; their ids derive from the transfer's own sequence
 * number, while the correlation ID may be shared by every transfer
 * of one higher-level operation.
 */
export interface ValueEntry {
  readonly id: string;
  readonly address: Address;
  readonly type: EntryType;
  readonly amount: bigint;
  readonly correlationId: string;
  readonly timestamp: string;
  readonly memo?: string | undefined;
}

export interface TransferOptions {
  readonly memo?: string | undefined;
  readonly correlationId?: string | undefined;
}

/**
 * Result of a successful transfer or funding operation.
 */
export interface TransferReceipt {
  readonly correlationId: string;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
  readonly timestamp: string;
}

// ─── Reports ─────────────────────────────────────────────────────────────

/**
 * Value is only created by funding; transfers move it.
 * The ledger is balanced when held value equals issued value.
 */
export interface ConservationReport {
  readonly balanced: boolean;
  readonly totalIssued: bigint;
  readonly totalHeld: bigint;
}

/**
 * Serializable snapshot of the ledger state (amounts as decimal strings).
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly LedgerAccount[];
  readonly balances: readonly { readonly address: Address; readonly balance: string }[];
  readonly entryCount: number;
  readonly totalIssued: string;
  readonly createdAt: string;
}

/**
 * Filter criteria for querying ledger entries.
 */
export interface EntryFilter {
  readonly address?: Address | undefined;
  readonly correlationId?: string | undefined;
  readonly type?: EntryType | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNKNOWN_ACCOUNT"
  | "DUPLICATE_ACCOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "RECEIVER_REJECTED";

/**
 * Structured error from the ledger.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}
