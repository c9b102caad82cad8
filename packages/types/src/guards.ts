/**
 * Runtime Type Guards
 *
 * Narrowing functions for Proofpass domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized events, signing-service payloads).
 */

import type { Address, EventRef, Hex } from "./identity.js";
import { ZERO_ADDRESS, ZERO_REF } from "./identity.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import type { DomainErrorCode } from "./errors.js";
import { ERROR_KINDS } from "./errors.js";

// =============================================================================
// Identity guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const EVENT_REF_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isEventRef(value: unknown): value is EventRef {
  return typeof value === "string" && EVENT_REF_PATTERN.test(value);
}

export function isZeroAddress(value: string): boolean {
  return value.toLowerCase() === ZERO_ADDRESS;
}

export function isZeroRef(value: string): boolean {
  return value.toLowerCase() === ZERO_REF;
}

/** Case-insensitive identity comparison. */
export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "attendance",
  "collectible",
  "attestation",
  "coordinator",
]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

// =============================================================================
// Error guards
// =============================================================================

export function isDomainErrorCode(value: unknown): value is DomainErrorCode {
  return typeof value === "string" && Object.hasOwn(ERROR_KINDS, value);
}
