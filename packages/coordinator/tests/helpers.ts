/**
 * Shared fixtures for coordinator tests.
 */

import { parseNative } from "@proofpass/ledger";
import { createDeployment } from "../src/deployment.js";
import type { Deployment, DeploymentConfig } from "../src/deployment.js";

export const TS = "2025-06-15T10:00:00.000Z";
export const TS_UNIX = 1749981600;

export const DEPLOYER = "0x1111111111111111111111111111111111111111";
export const TREASURY = "0x2222222222222222222222222222222222222222";
export const ORGANIZER = "0x3333333333333333333333333333333333333333";
export const USER = "0x4444444444444444444444444444444444444444";
export const BOB = "0x5555555555555555555555555555555555555555";
export const CREATOR = "0x6666666666666666666666666666666666666666";

export const FEE = 10_000_000_000_000_000n;
export const ONE_ETHER = parseNative("1");

export function deploy(overrides: Partial<DeploymentConfig> = {}): Deployment {
  return createDeployment({
    deployer: DEPLOYER,
    treasury: TREASURY,
    issuance: { mode: "allow-list" },
    runtime: { clock: () => new Date(TS) },
    ...overrides,
  });
}

/** Distinct wallet addresses 0x…01, 0x…02, … */
export function wallet(n: number): `0x${string}` {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

/** Error code of a thrown domain error, or undefined if nothing threw. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return errorCode(err);
  }
  return undefined;
}

export async function asyncCodeOf(fn: () => Promise<unknown>): Promise<string | undefined> {
  try {
    await fn();
  } catch (err) {
    return errorCode(err);
  }
  return undefined;
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  throw err;
}
