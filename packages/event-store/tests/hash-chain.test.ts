/**
 * Tests for the event store hash chain.
 *
 * 1. Hashes are deterministic SHA-256 hex
 * 2. Any N appended events form a valid chain (property)
 * 3. Tampering with content or links is detected
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@proofpass/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { HashableEvent } from "../src/hash-chain.js";
import type { StoredEvent } from "../src/types.js";

const TS = "2025-01-01T00:00:00.000Z";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: TS,
      actor: "0x1111111111111111111111111111111111111111",
      correlationId: "tx-1",
      source: "collectible",
    },
    payload,
  };
}

const BASE: HashableEvent = {
  event: makeEvent("test"),
  streamId: "s",
  version: 1,
  globalPosition: 1,
  appendedAt: TS,
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(BASE, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeEventHash(BASE, GENESIS_HASH)).toBe(computeEventHash({ ...BASE }, GENESIS_HASH));
  });

  it("ignores key order in payloads", () => {
    const a = { ...BASE, event: makeEvent("test", { x: 1, y: 2 }) };
    const b = { ...BASE, event: makeEvent("test", { y: 2, x: 1 }) };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when content or previous hash changes", () => {
    const tampered = { ...BASE, event: makeEvent("test", { tampered: true }) };
    const h = computeEventHash(BASE, GENESIS_HASH);
    expect(computeEventHash(tampered, GENESIS_HASH)).not.toBe(h);
    expect(computeEventHash(BASE, "other")).not.toBe(h);
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

function storeWith(count: number): InMemoryEventStore {
  const store = new InMemoryEventStore({ clock: () => new Date(TS) });
  for (let i = 0; i < count; i++) {
    store.append(i % 2 === 0 ? "a" : "b", [makeEvent(`e${String(i)}`, { i })]);
  }
  return store;
}

describe("verifyHashChain", () => {
  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts a chain built by the store", () => {
    expect(storeWith(4).verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 4,
      errors: [],
    });
  });

  it("detects a modified payload", () => {
    const events = [...storeWith(3).readAll()];
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    const forged: StoredEvent = {
      ...second,
      event: { ...second.event, payload: { i: 99 } },
    };
    events[1] = forged;

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("detects a removed event", () => {
    const events = storeWith(3).readAll().filter((e) => e.globalPosition !== 2);
    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(3);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("holds for any sequence of appends", () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.record({
            stream: fc.constantFrom("attendance", "collectible", "events"),
            value: fc.integer(),
          }),
          { minLength: 1, maxLength: 20 },
        ),
        (appends) => {
          const store = new InMemoryEventStore();
          for (const { stream, value } of appends) {
            store.append(stream, [makeEvent("prop", { value })]);
          }
          const result = store.verifyIntegrity();
          expect(result.valid).toBe(true);
          expect(result.lastVerifiedPosition).toBe(appends.length);
        },
      ),
    );
  });
});
