/**
 * @proofpass/event-store — Hash chain over the global event log.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * with the previous event's hash appended:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing any stored event breaks the chain from that point forward.
 * Payloads must therefore be plain JSON: amounts travel as decimal strings.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/** Fields of a stored event covered by its hash. */
export type HashableEvent = Omit<StoredEvent, "hash" | "previousHash">;

function canonicalEventContent(event: HashableEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of an event's canonical content and its
 * predecessor's hash.
 */
export function computeEventHash(
  event: HashableEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify a sequence of events given in global position order.
 * Reports every link or content mismatch; verification continues past
 * a break using the stored hash as the next expected link.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    let intact = true;

    if (event.previousHash !== previousHash) {
      intact = false;
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${String(event.globalPosition)}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      intact = false;
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${String(event.globalPosition)}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    if (intact && errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
