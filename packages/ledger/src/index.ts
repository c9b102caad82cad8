/**
 * @proofpass/ledger — Append-only value ledger.
 *
 * The native-value substrate the registries execute on:
 * - Every transfer writes a balanced debit/credit pair
 * - Entries are immutable once appended
 * - All arithmetic uses bigint wei (no floating point)
 * - Receive hooks let components react to incoming value
 * - checkpoint() gives callers all-or-nothing semantics
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";

// Account registry
export { AccountRegistry, accountKey } from "./accounts.js";

// Money arithmetic
export {
  NATIVE_DECIMALS,
  BASIS_POINTS,
  parseAmount,
  formatAmount,
  parseNative,
  formatNative,
  applyBasisPoints,
} from "./money-math.js";

// Types
export type {
  AccountKind,
  LedgerAccount,
  ValueTransfer,
  ReceiveHook,
  OpenAccountOptions,
  EntryType,
  ValueEntry,
  TransferOptions,
  TransferReceipt,
  ConservationReport,
  LedgerSnapshot,
  EntryFilter,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
