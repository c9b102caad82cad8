/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - ReadAll: global ordering, from position, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, concurrency conflicts
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@proofpass/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const TS = "2025-06-15T10:00:00.000Z";

function makeEvent(type: string, n = 1): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}-${String(n)}`,
      timestamp: TS,
      actor: "0x1111111111111111111111111111111111111111",
      correlationId: `tx-${String(n)}`,
      source: "attendance",
    },
    payload: { n },
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${String(i + 1)}`, i + 1));
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof EventStoreError) return err.code;
    throw err;
  }
  return undefined;
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();
    const result = store.append("attendance", [makeEvent("a")]);

    expect(result).toEqual({ streamId: "attendance", fromVersion: 1, toVersion: 1, count: 1 });
    expect(store.streamExists("attendance")).toBe(true);
  });

  it("appends a batch with contiguous versions", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(2));
    const result = store.append("s", makeEvents(3));

    expect(result.fromVersion).toBe(3);
    expect(result.toVersion).toBe(5);
    expect(store.read("s").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["a", 1],
      ["a", 2],
      ["b", 3],
    ]);
    expect(store.globalPosition()).toBe(3);
  });

  it("stamps appendedAt from the injected clock", () => {
    const store = new InMemoryEventStore({ clock: () => new Date(TS) });
    store.append("s", [makeEvent("a")]);
    expect(store.read("s")[0]?.appendedAt).toBe(TS);
  });

  it("links each event to its predecessor", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(1));
    store.append("b", makeEvents(1));
    const [first, second] = store.readAll();

    expect(first?.previousHash).toBe("genesis");
    expect(second?.previousHash).toBe(first?.hash);
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();
    expect(codeOf(() => store.append("s", []))).toBe("EMPTY_APPEND");
  });

  it("rejects an empty stream ID", () => {
    const store = new InMemoryEventStore();
    expect(codeOf(() => store.append("", [makeEvent("a")]))).toBe("INVALID_STREAM_ID");
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts a matching version", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(2));
    expect(store.append("s", makeEvents(1), { expectedVersion: 2 }).toVersion).toBe(3);
  });

  it("rejects a stale version", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(2));
    expect(codeOf(() => store.append("s", makeEvents(1), { expectedVersion: 1 }))).toBe(
      "CONCURRENCY_CONFLICT",
    );
    expect(store.streamVersion("s")).toBe(2);
  });

  it("enforces no_stream", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1), { expectedVersion: "no_stream" });
    expect(
      codeOf(() => store.append("s", makeEvents(1), { expectedVersion: "no_stream" })),
    ).toBe("CONCURRENCY_CONFLICT");
  });

  it("skips the check for any", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1));
    expect(store.append("s", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(2);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty array for unknown streams", () => {
    expect(new InMemoryEventStore().read("missing")).toEqual([]);
  });

  it("reads forward from a version with a limit", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(5));
    const events = store.read("s", { fromVersion: 2, maxCount: 2 });
    expect(events.map((e) => e.event.type)).toEqual(["event.2", "event.3"]);
  });

  it("reads backward from the head by default", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(3));
    const events = store.read("s", { direction: "backward" });
    expect(events.map((e) => e.version)).toEqual([3, 2, 1]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    store.append("s", makeEvents(1));
    expect(codeOf(() => store.read("s", { fromVersion: 0 }))).toBe("INVALID_VERSION");
  });

  it("reads all streams from a position", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(2));
    expect(store.readAll({ fromPosition: 3 }).map((e) => e.globalPosition)).toEqual([3, 4]);
    expect(
      store.readAll({ direction: "backward", maxCount: 1 }).map((e) => e.globalPosition),
    ).toEqual([4]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events in order", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("s", handler);

    store.append("s", makeEvents(2));
    store.append("other", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map((call) => call[0].version)).toEqual([1, 2]);
  });

  it("delivers every stream to global subscribers", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribeAll(handler);

    store.append("a", makeEvents(1));
    store.append("b", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("stops delivering after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribe("s", handler);
    const all = store.subscribeAll(handler);

    sub.unsubscribe();
    all.unsubscribe();
    store.append("s", makeEvents(1));

    expect(handler).not.toHaveBeenCalled();
  });

  it("sees the event already stored when notified", () => {
    const store = new InMemoryEventStore();
    let seenPosition = 0;
    store.subscribeAll(() => {
      seenPosition = store.globalPosition();
    });
    store.append("s", makeEvents(1));
    expect(seenPosition).toBe(1);
  });
});
