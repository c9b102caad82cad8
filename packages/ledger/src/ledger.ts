/**
 * @proofpass/ledger — Core Ledger class.
 *
 * Append-only value ledger. Every movement of value is written as a
 * balanced debit/credit pair; balances are derived incrementally and
 * never go negative.
 *
 * API surface:
 * - openAccount() — Register an address, optionally with a receive hook
 * - fund() — Issue new value to an address (debited from the zero address)
 * - transfer() — Move value between addresses
 * - balanceOf() — Current balance of an address
 * - getEntries() — Query entries with optional filters
 * - verifyConservation() — Check that held value equals issued value
 * - checkpoint() — Capture state, returning a restore function
 * - snapshot() — Serialize the ledger state
 *
 * There is NO update() or delete(). Reverting a failed operation is done
 * by the caller through checkpoint(), never by editing entries.
 */

import type { Address } from "@proofpass/types";
import { ZERO_ADDRESS } from "@proofpass/types";
import { AccountRegistry, accountKey } from "./accounts.js";
import type {
  ConservationReport,
  EntryFilter,
  LedgerAccount,
  LedgerSnapshot,
  OpenAccountOptions,
  TransferOptions,
  TransferReceipt,
  ValueEntry,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface LedgerOptions {
  /** Source of entry timestamps. Defaults to the wall clock. */
  readonly clock?: (() => Date) | undefined;
}

export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _balances: Map<string, bigint> = new Map();
  private readonly _entries: ValueEntry[] = [];
  private readonly _clock: () => Date;
  private _totalIssued = 0n;
  private _sequence = 0;

  constructor(options?: LedgerOptions) {
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Account Management ──────────────────────────────────────────────

  openAccount(address: Address, options?: OpenAccountOptions): LedgerAccount {
    return this._accounts.register(address, options ?? {}, this.now());
  }

  getAccount(address: Address): LedgerAccount | undefined {
    return this._accounts.get(address);
  }

  hasAccount(address: Address): boolean {
    return this._accounts.has(address);
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Issue new value to an address. The account is opened if needed.
   * Receive hooks do not run for funding.
   */
  fund(address: Address, amount: bigint, memo?: string): TransferReceipt {
    assertPositive(amount);
    if (!this._accounts.has(address)) {
      this.openAccount(address);
    }

    const correlationId = `fund:${String(++this._sequence)}`;
    const timestamp = this.now();
    this.write(ZERO_ADDRESS, address, amount, correlationId, correlationId, timestamp, memo);
    this._totalIssued += amount;

    return { correlationId, from: ZERO_ADDRESS, to: address, amount, timestamp };
  }

  /**
   * Move value from one account to another.
   *
   * Validation (fail-closed):
   * 1. Amount must be positive
   * 2. Sender must exist and hold at least `amount`
   * 3. Recipient is opened as a wallet if unknown
   *
   * After the entries are written the recipient's receive hook runs.
   * If it throws, this transfer is undone and RECEIVER_REJECTED is thrown
   * with the hook's error as cause.
   */
  transfer(
    from: Address,
    to: Address,
    amount: bigint,
    options?: TransferOptions,
  ): TransferReceipt {
    assertPositive(amount);
    this._accounts.assertExists(from);

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance in ${from}: has ${balance.toString()}, needs ${amount.toString()}`,
      );
    }

    const restore = this.checkpoint();
    if (!this._accounts.has(to)) {
      this.openAccount(to);
    }

    const transferId = `transfer:${String(++this._sequence)}`;
    const correlationId = options?.correlationId ?? transferId;
    const timestamp = this.now();
    this.write(from, to, amount, transferId, correlationId, timestamp, options?.memo);

    const hook = this._accounts.hookFor(to);
    if (hook !== undefined) {
      try {
        hook({
          from,
          to,
          amount,
          correlationId,
          ...(options?.memo !== undefined ? { memo: options.memo } : {}),
        });
      } catch (err) {
        restore();
        throw new LedgerError(
          "RECEIVER_REJECTED",
          `Receiver ${to} rejected transfer of ${amount.toString()}`,
          { cause: err },
        );
      }
    }

    return { correlationId, from, to, amount, timestamp };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this._balances.get(accountKey(address)) ?? 0n;
  }

  getEntries(filter?: EntryFilter): readonly ValueEntry[] {
    if (filter === undefined) {
      return [...this._entries];
    }
    const key = filter.address !== undefined ? accountKey(filter.address) : undefined;
    return this._entries.filter(
      (entry) =>
        (key === undefined || accountKey(entry.address) === key) &&
        (filter.correlationId === undefined ||
          entry.correlationId === filter.correlationId) &&
        (filter.type === undefined || entry.type === filter.type),
    );
  }

  getEntriesByCorrelation(correlationId: string): readonly ValueEntry[] {
    return this.getEntries({ correlationId });
  }

  get entryCount(): number {
    return this._entries.length;
  }

  get totalIssued(): bigint {
    return this._totalIssued;
  }

  verifyConservation(): ConservationReport {
    let totalHeld = 0n;
    for (const balance of this._balances.values()) {
      totalHeld += balance;
    }
    return {
      balanced: totalHeld === this._totalIssued,
      totalIssued: this._totalIssued,
      totalHeld,
    };
  }

  // ─── State Capture ───────────────────────────────────────────────────

  /**
   * Capture the full ledger state. Calling the returned function puts
   * balances, entries, accounts and counters back as they were.
   */
  checkpoint(): () => void {
    const restoreAccounts = this._accounts.checkpoint();
    const balances = new Map(this._balances);
    const entryCount = this._entries.length;
    const totalIssued = this._totalIssued;
    const sequence = this._sequence;

    return () => {
      restoreAccounts();
      this._balances.clear();
      for (const [key, value] of balances) {
        this._balances.set(key, value);
      }
      this._entries.length = entryCount;
      this._totalIssued = totalIssued;
      this._sequence = sequence;
    };
  }

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this._accounts.getAll(),
      balances: this._accounts.getAll().map((account) => ({
        address: account.address,
        balance: this.balanceOf(account.address).toString(),
      })),
      entryCount: this._entries.length,
      totalIssued: this._totalIssued.toString(),
      createdAt: this.now(),
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private write(
    from: Address,
    to: Address,
    amount: bigint,
    transferId: string,
    correlationId: string,
    timestamp: string,
    memo: string | undefined,
  ): void {
    const memoField = memo !== undefined ? { memo } : {};
    this._entries.push(
      {
        id: `${transferId}:debit`,
        address: from,
        type: "debit",
        amount,
        correlationId,
        timestamp,
        ...memoField,
      },
      {
        id: `${transferId}:credit`,
        address: to,
        type: "credit",
        amount,
        correlationId,
        timestamp,
        ...memoField,
      },
    );

    if (from !== ZERO_ADDRESS) {
      const fromKey = accountKey(from);
      this._balances.set(fromKey, (this._balances.get(fromKey) ?? 0n) - amount);
    }
    const toKey = accountKey(to);
    this._balances.set(toKey, (this._balances.get(toKey) ?? 0n) + amount);
  }

  private now(): string {
    return this._clock().toISOString();
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount must be positive, got ${amount.toString()}`,
    );
  }
}
