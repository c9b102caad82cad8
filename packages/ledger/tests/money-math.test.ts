/**
 * Tests for native-unit arithmetic.
 *
 * Covers:
 * - Decimal string parsing and formatting
 * - Native (18-decimal) helpers
 * - Basis-point shares
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  parseNative,
  formatNative,
  applyBasisPoints,
  BASIS_POINTS,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses zero", () => {
    expect(parseAmount("0", 6)).toBe(0n);
  });

  it("parses zero with decimals", () => {
    expect(parseAmount("0.000000", 6)).toBe(0n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 6)).toBe(1_500_000n);
  });

  it("handles zero decimals", () => {
    expect(parseAmount("42", 0)).toBe(42n);
  });

  it("handles large amounts (18 decimals like ETH)", () => {
    expect(parseAmount("1.000000000000000001", 18)).toBe(1_000_000_000_000_000_001n);
  });

  it("rejects empty string", () => {
    expect(() => parseAmount("", 6)).toThrow(LedgerError);
  });

  it("rejects whitespace-only", () => {
    expect(() => parseAmount("   ", 6)).toThrow(LedgerError);
  });

  it("rejects non-numeric", () => {
    expect(() => parseAmount("abc", 6)).toThrow(LedgerError);
  });

  it("rejects excess decimal places", () => {
    expect(() => parseAmount("1.1234567", 6)).toThrow(LedgerError);
  });

  it("rejects double decimal points", () => {
    expect(() => parseAmount("1.2.3", 6)).toThrow(LedgerError);
  });

  it("rejects leading plus sign", () => {
    expect(() => parseAmount("+100", 6)).toThrow(LedgerError);
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats a whole number with decimals", () => {
    expect(formatAmount(100_000_000n, 6)).toBe("100.000000");
  });

  it("formats a fractional amount", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
  });

  it("formats zero", () => {
    expect(formatAmount(0n, 6)).toBe("0.000000");
  });

  it("formats negative amount", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats zero decimals", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });

  it("formats sub-unit amount (less than 1.0)", () => {
    expect(formatAmount(500n, 6)).toBe("0.000500");
  });

  it("round-trips with parseAmount", () => {
    const original = "123.456789";
    const parsed = parseAmount(original, 6);
    expect(formatAmount(parsed, 6)).toBe(original);
  });
});

// ─── Native helpers ──────────────────────────────────────────────────────

describe("parseNative / formatNative", () => {
  it("parses a fee in ether units to wei", () => {
    expect(parseNative("0.01")).toBe(10_000_000_000_000_000n);
  });

  it("formats wei with 18 decimals", () => {
    expect(formatNative(10_000_000_000_000_000n)).toBe("0.010000000000000000");
  });

  it("rejects more than 18 decimal places", () => {
    expect(() => parseNative("0.0000000000000000001")).toThrow(LedgerError);
  });
});

// ─── applyBasisPoints ────────────────────────────────────────────────────

describe("applyBasisPoints", () => {
  it("takes 37.5% of 0.01 ether exactly", () => {
    expect(applyBasisPoints(10_000_000_000_000_000n, 3750)).toBe(
      3_750_000_000_000_000n,
    );
  });

  it("rounds down", () => {
    expect(applyBasisPoints(3n, 3750)).toBe(1n);
    expect(applyBasisPoints(1n, 3750)).toBe(0n);
  });

  it("handles the bounds", () => {
    expect(applyBasisPoints(999n, 0)).toBe(0n);
    expect(applyBasisPoints(999n, BASIS_POINTS)).toBe(999n);
  });

  it("rejects out-of-range or fractional basis points", () => {
    expect(() => applyBasisPoints(1n, -1)).toThrow(LedgerError);
    expect(() => applyBasisPoints(1n, 10_001)).toThrow(LedgerError);
    expect(() => applyBasisPoints(1n, 12.5)).toThrow(LedgerError);
  });
});
