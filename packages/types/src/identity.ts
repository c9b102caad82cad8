/**
 * Identity Types
 *
 * Every participant (wallet, registry, treasury, organizer) is identified by
 * an EVM-style address. Events are identified by 32-byte references.
 *
 * Rules:
 * - The zero address is the null identity and never owns anything
 * - The zero reference is never a valid event
 * - Comparisons are case-insensitive; storage uses checksummed form
 */

/** Hex string with the `0x` prefix. */
export type Hex = `0x${string}`;

/** 20-byte account identifier. */
export type Address = `0x${string}`;

/** 32-byte event reference (keccak256 of the event's defining fields). */
export type EventRef = `0x${string}`;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const ZERO_REF: EventRef =
  "0x0000000000000000000000000000000000000000000000000000000000000000";
