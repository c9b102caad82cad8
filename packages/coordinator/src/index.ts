/**
 * @proofpass/coordinator — Event lifecycle and end-to-end operations.
 *
 * Provides:
 * - EventCoordinator (events, mint/pair with attestation, history queries)
 * - createDeployment() wiring every component together
 */

export { EventCoordinator } from "./coordinator.js";
export type { CoordinatorConfig } from "./coordinator.js";

export { createDeployment, deploymentAddresses, DEFAULT_UPGRADE_FEE } from "./deployment.js";
export type { DeploymentConfig, Deployment } from "./deployment.js";

export { deriveEventRef } from "./event-ref.js";

export type {
  EventRecord,
  CreateEventInput,
  UpdateEventInput,
  MintWithAttestationInput,
  MintResult,
  PairWithAttestationInput,
  PairResult,
  ContractAddresses,
  CoordinatorContracts,
  CoordinatorErrorCode,
} from "./types.js";
export { CoordinatorError } from "./types.js";
