/**
 * @proofpass/runtime — Execution runtime for the Proofpass registries.
 *
 * Owns the ledger, the event store and the clock, and runs every state
 * transition as an all-or-nothing transaction.
 */

export { ExecutionRuntime } from "./runtime.js";
export type { Revertible, RuntimeOptions, RuntimeErrorCode } from "./types.js";
export { RuntimeError } from "./types.js";
export { toChecksumAddress, toNonZeroAddress } from "./identity.js";
