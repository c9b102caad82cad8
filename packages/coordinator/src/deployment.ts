/**
 * @proofpass/coordinator — Deployment wiring.
 *
 * Builds a runtime, the three registries and the coordinator, and
 * connects them:
 *
 * 1. attendance registry   (deployer nonce 0)
 * 2. attestation log       (deployer nonce 1, admin = coordinator)
 * 3. collectible registry  (deployer nonce 2)
 * 4. coordinator           (deployer nonce 3)
 * 5. collectible registry becomes the attendance registry's voider
 * 6. allow-list deployments allow-list the coordinator as issuer
 *
 * Component addresses follow the CREATE address rule, so a deployer
 * always produces the same addresses.
 */

import { getContractAddress } from "viem";
import type { Address } from "@proofpass/types";
import { ExecutionRuntime } from "@proofpass/runtime";
import type { RuntimeOptions } from "@proofpass/runtime";
import { parseNative } from "@proofpass/ledger";
import { AttendanceTokenRegistry } from "@proofpass/attendance";
import type { IssuanceConfig } from "@proofpass/attendance";
import { CollectibleTokenRegistry } from "@proofpass/collectible";
import type { FeeSplit, UpgradeVariant } from "@proofpass/collectible";
import { AttestationLog } from "@proofpass/attestation";
import { EventCoordinator } from "./coordinator.js";
import type { ContractAddresses } from "./types.js";

export const DEFAULT_UPGRADE_FEE = parseNative("0.01");

export interface DeploymentConfig {
  readonly deployer: Address;

  /** Administrator of every component. Defaults to the deployer. */
  readonly admin?: Address | undefined;
  readonly treasury: Address;
  readonly issuance: IssuanceConfig;

  /** Defaults to 0.01 native units. */
  readonly fee?: bigint | undefined;
  readonly split?: FeeSplit | undefined;
  readonly variant?: UpgradeVariant | undefined;
  readonly attendanceBaseURI?: string | undefined;
  readonly collectibleBaseURI?: string | undefined;
  readonly runtime?: RuntimeOptions | undefined;
}

export interface Deployment {
  readonly runtime: ExecutionRuntime;
  readonly attendance: AttendanceTokenRegistry;
  readonly attestation: AttestationLog;
  readonly collectible: CollectibleTokenRegistry;
  readonly coordinator: EventCoordinator;
  readonly addresses: ContractAddresses;
}

/** Addresses the deployer's first four deployments receive. */
export function deploymentAddresses(deployer: Address): ContractAddresses {
  const at = (nonce: bigint): Address => getContractAddress({ from: deployer, nonce });
  return {
    attendance: at(0n),
    attestation: at(1n),
    collectible: at(2n),
    coordinator: at(3n),
  };
}

export function createDeployment(config: DeploymentConfig): Deployment {
  const runtime = new ExecutionRuntime(config.runtime);
  const admin = config.admin ?? config.deployer;
  const addresses = deploymentAddresses(config.deployer);

  return runtime.atomically(() => {
    const attendance = new AttendanceTokenRegistry(runtime, {
      address: addresses.attendance,
      admin,
      issuance: config.issuance,
      baseURI: config.attendanceBaseURI,
    });
    const attestation = new AttestationLog(runtime, {
      address: addresses.attestation,
      admin: addresses.coordinator,
    });
    const collectible = new CollectibleTokenRegistry(runtime, {
      address: addresses.collectible,
      admin,
      treasury: config.treasury,
      attendance,
      fee: config.fee ?? DEFAULT_UPGRADE_FEE,
      split: config.split,
      variant: config.variant,
      baseURI: config.collectibleBaseURI,
    });
    const coordinator = new EventCoordinator(runtime, {
      address: addresses.coordinator,
      admin,
      attendance,
      collectible,
      attestation,
    });

    attendance.setAuthorizedVoider(admin, collectible.address);
    if (attendance.issuanceMode === "allow-list") {
      attendance.setAllowedIssuer(admin, coordinator.address, true);
    }

    return { runtime, attendance, attestation, collectible, coordinator, addresses };
  });
}
