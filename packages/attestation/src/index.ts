/**
 * @proofpass/attestation — Append-only attestation log.
 */

export { AttestationLog } from "./log.js";
export { computeAttestationId } from "./attestation-id.js";

export type {
  Attestation,
  AttestationInput,
  AttestationBatch,
  AttestationLogConfig,
  AttestationErrorCode,
} from "./types.js";
export { AttestationError } from "./types.js";
