/**
 * @proofpass/types — Shared domain types for the Proofpass stack.
 *
 * These types are used across all Proofpass packages:
 * - Identities (addresses, event references)
 * - Event architecture
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Identity types
export type { Hex, Address, EventRef } from "./identity.js";
export { ZERO_ADDRESS, ZERO_REF } from "./identity.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Error taxonomy
export type { ErrorKind, DomainErrorCode } from "./errors.js";
export { ERROR_KINDS, errorKindOf } from "./errors.js";

// Runtime type guards
export {
  isHex,
  isAddress,
  isEventRef,
  isZeroAddress,
  isZeroRef,
  sameAddress,
  isEventMetadata,
  isDomainEvent,
  isDomainErrorCode,
} from "./guards.js";
