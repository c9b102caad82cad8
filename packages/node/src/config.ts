/**
 * @proofpass/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and turns it into the deployment the service runs.
 */

import { z } from "zod";
import type { Address } from "@proofpass/types";
import { isAddress } from "@proofpass/types";
import { BASIS_POINTS, parseNative } from "@proofpass/ledger";
import type { DeploymentConfig } from "@proofpass/coordinator";

// =============================================================================
// Schema
// =============================================================================

const AddressVar = z.custom<Address>((value) => isAddress(value), {
  message: "Expected a 20-byte hex address",
});

/** Ether-denominated decimal string, converted to wei. */
const EtherVar = z.string().transform((value, ctx) => {
  try {
    const wei = parseNative(value);
    if (wei >= 0n) {
      return wei;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Amount cannot be negative" });
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : "Invalid amount",
    });
  }
  return z.NEVER;
});

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Deployment identities
  DEPLOYER_ADDRESS: AddressVar,
  ADMIN_ADDRESS: AddressVar.optional(),
  TREASURY_ADDRESS: AddressVar,

  // Pairing economics
  UPGRADE_FEE: EtherVar.default("0.01"),
  TREASURY_SPLIT_BPS: z.coerce.number().int().min(1).max(BASIS_POINTS - 1).default(3750),
  UPGRADE_VARIANT: z.enum(["burn", "companion"]).default("burn"),

  // Issuance
  ISSUANCE_MODE: z.enum(["allow-list", "signature"]).default("allow-list"),
  ISSUER_ADDRESS: AddressVar.optional(),

  // Metadata
  ATTENDANCE_BASE_URI: z.string().default(""),
  COLLECTIBLE_BASE_URI: z.string().default(""),

  // Development
  ENABLE_FAUCET: z
    .string()
    .transform((v) => v === "true")
    .default("false"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * The deployment described by a loaded configuration. The organizer
 * share is whatever the treasury share leaves.
 */
export function deploymentConfigFrom(config: AppConfig): DeploymentConfig {
  return {
    deployer: config.DEPLOYER_ADDRESS,
    admin: config.ADMIN_ADDRESS,
    treasury: config.TREASURY_ADDRESS,
    issuance:
      config.ISSUANCE_MODE === "signature"
        ? { mode: "signature", issuer: config.ISSUER_ADDRESS }
        : { mode: "allow-list" },
    fee: config.UPGRADE_FEE,
    split: {
      treasuryBps: config.TREASURY_SPLIT_BPS,
      organizerBps: BASIS_POINTS - config.TREASURY_SPLIT_BPS,
    },
    variant: config.UPGRADE_VARIANT,
    attendanceBaseURI: config.ATTENDANCE_BASE_URI,
    collectibleBaseURI: config.COLLECTIBLE_BASE_URI,
  };
}
