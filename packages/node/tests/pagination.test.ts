/**
 * Tests for cursor pagination.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

const items = Array.from({ length: 12 }, (_, i) => ({ sequence: i }));
const key = (item: { sequence: number }): number => item.sequence;

describe("paginate", () => {
  it("returns everything when under the limit", () => {
    expect(paginate(items.slice(0, 3), { limit: 5 }, key, "sequence")).toEqual({
      data: items.slice(0, 3),
      pagination: { cursor: null, hasMore: false },
    });
  });

  it("walks pages in numeric order", () => {
    const first = paginate(items, { limit: 5 }, key, "sequence");
    expect(first.data.map(key)).toEqual([0, 1, 2, 3, 4]);
    expect(first.pagination.cursor).toBe(encodeCursor("sequence", 4));

    const second = paginate(items, { limit: 5, cursor: first.pagination.cursor ?? undefined }, key, "sequence");
    expect(second.data.map(key)).toEqual([5, 6, 7, 8, 9]);

    const third = paginate(items, { limit: 5, cursor: second.pagination.cursor ?? undefined }, key, "sequence");
    expect(third.data.map(key)).toEqual([10, 11]);
    expect(third.pagination.hasMore).toBe(false);
  });

  it("ignores cursors for other fields and malformed cursors", () => {
    const foreign = paginate(items, { limit: 2, cursor: encodeCursor("position", 5) }, key, "sequence");
    expect(foreign.data.map(key)).toEqual([0, 1]);

    const garbage = paginate(items, { limit: 2, cursor: "%%%" }, key, "sequence");
    expect(garbage.data.map(key)).toEqual([0, 1]);
  });
});

describe("decodeCursor", () => {
  it("round-trips an encoded cursor", () => {
    expect(decodeCursor(encodeCursor("sequence", 17))).toEqual({ field: "sequence", value: 17 });
  });

  it("rejects cursors with the wrong shape", () => {
    const stringValue = Buffer.from(JSON.stringify({ f: "sequence", v: "17" })).toString("base64url");
    expect(decodeCursor(stringValue)).toBeUndefined();
  });
});
