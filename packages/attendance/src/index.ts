/**
 * @proofpass/attendance — Non-transferable attendance tokens.
 *
 * Provides:
 * - AttendanceTokenRegistry (allow-list or issuer-signature issuance)
 * - Issuer signing helpers for the off-chain signing service and tests
 */

export { AttendanceTokenRegistry } from "./registry.js";

export {
  issuanceDigest,
  signIssuance,
  recoverIssuer,
  verifyIssuanceProof,
} from "./signing.js";

export type {
  AttendanceToken,
  OwnershipChange,
  IssuanceConfig,
  IssuanceMode,
  IssuanceFields,
  IssueRequest,
  IssuanceGrant,
  AttendanceRegistryConfig,
  AttendanceErrorCode,
} from "./types.js";
export { AttendanceError } from "./types.js";
