/**
 * @proofpass/ledger — Deterministic native-unit arithmetic.
 *
 * Balances are integers in the smallest unit (wei). Human-facing
 * amounts ("0.01") are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Basis-point shares round down; callers assign the remainder
 */

import { LedgerError } from "./types.js";

/** Decimals of the native unit (ether → wei). */
export const NATIVE_DECIMALS = 18;

/** 10,000 basis points = 100%. */
export const BASIS_POINTS = 10_000;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "0.01" with decimals=18 → 10000000000000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/** "0.01" → 10000000000000000n */
export function parseNative(amount: string): bigint {
  return parseAmount(amount, NATIVE_DECIMALS);
}

/** 10000000000000000n → "0.010000000000000000" */
export function formatNative(amount: bigint): string {
  return formatAmount(amount, NATIVE_DECIMALS);
}

/**
 * floor(amount * bps / 10000).
 */
export function applyBasisPoints(amount: bigint, bps: number): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps > BASIS_POINTS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Basis points must be an integer between 0 and ${String(BASIS_POINTS)}, got ${String(bps)}`,
    );
  }
  return (amount * BigInt(bps)) / BigInt(BASIS_POINTS);
}
