/**
 * @proofpass/ledger — Account registry.
 *
 * Tracks every address the ledger has seen. Accounts are keyed by the
 * lowercased address so checksummed and lowercase forms resolve to the
 * same account.
 *
 * Rules:
 * - No duplicate addresses
 * - Once created, account metadata cannot be modified
 * - Receive hooks are attached at open time only
 */

import type { Address } from "@proofpass/types";
import type { LedgerAccount, OpenAccountOptions, ReceiveHook } from "./types.js";
import { LedgerError } from "./types.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/** Canonical map key for an address. */
export function accountKey(address: Address): string {
  return address.toLowerCase();
}

export class AccountRegistry {
  private readonly _accounts: Map<string, LedgerAccount> = new Map();
  private readonly _hooks: Map<string, ReceiveHook> = new Map();

  /**
   * Register a new account.
   * Throws if the address is malformed or already registered.
   */
  register(
    address: Address,
    options: OpenAccountOptions,
    timestamp: string,
  ): LedgerAccount {
    if (!ADDRESS_PATTERN.test(address)) {
      throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${address}"`);
    }
    const key = accountKey(address);
    if (this._accounts.has(key)) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT",
        `Account already exists: "${address}"`,
      );
    }

    const account: LedgerAccount = {
      address,
      kind: options.kind ?? "wallet",
      ...(options.label !== undefined ? { label: options.label } : {}),
      createdAt: timestamp,
    };

    this._accounts.set(key, account);
    if (options.onReceive !== undefined) {
      this._hooks.set(key, options.onReceive);
    }
    return account;
  }

  get(address: Address): LedgerAccount | undefined {
    return this._accounts.get(accountKey(address));
  }

  has(address: Address): boolean {
    return this._accounts.has(accountKey(address));
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(address: Address): LedgerAccount {
    const account = this._accounts.get(accountKey(address));
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${address}"`);
    }
    return account;
  }

  hookFor(address: Address): ReceiveHook | undefined {
    return this._hooks.get(accountKey(address));
  }

  getAll(): readonly LedgerAccount[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }

  /**
   * Capture the current set of accounts.
   * The returned function forgets every account registered since.
   */
  checkpoint(): () => void {
    const known = new Set(this._accounts.keys());
    return () => {
      for (const key of [...this._accounts.keys()]) {
        if (!known.has(key)) {
          this._accounts.delete(key);
          this._hooks.delete(key);
        }
      }
    };
  }
}
