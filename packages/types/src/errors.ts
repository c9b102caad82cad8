/**
 * Error taxonomy shared by every Proofpass package.
 *
 * Each package throws its own Error subclass with a machine-readable code;
 * the code determines the kind. Kinds tell callers how to react:
 *
 * - validation: fix the input and resubmit
 * - authorization: wrong identity or proof; never retried automatically
 * - state-conflict: impossible in the current state; re-query before retrying
 * - resource: the referenced entity does not exist
 * - payout: an external payout failed and the whole operation was rolled back
 */

export type ErrorKind =
  | "validation"
  | "authorization"
  | "state-conflict"
  | "resource"
  | "payout";

export const ERROR_KINDS = {
  // Validation
  INVALID_ORGANIZER: "validation",
  INVALID_RECIPIENT: "validation",
  INVALID_ADDRESS: "validation",
  EMPTY_METADATA_URI: "validation",
  EMPTY_NAME: "validation",
  EMPTY_IMAGE_REF: "validation",
  INVALID_EVENT_REF: "validation",
  INVALID_HOLDER: "validation",
  ARRAY_LENGTH_MISMATCH: "validation",
  INVALID_SPLIT: "validation",
  INVALID_FEE: "validation",
  INSUFFICIENT_FEE: "validation",
  INVALID_CAPACITY: "validation",
  INVALID_TOKEN_ID: "validation",
  EVENT_MISMATCH: "validation",

  // Authorization
  UNAUTHORIZED: "authorization",
  NOT_CREATOR: "authorization",
  NOT_OWNER: "authorization",
  ISSUER_NOT_CONFIGURED: "authorization",
  INVALID_PROOF: "authorization",
  TRANSFER_NOT_ALLOWED: "authorization",

  // State conflict
  DUPLICATE_ISSUANCE: "state-conflict",
  ALREADY_PAIRED: "state-conflict",
  EVENT_FULL: "state-conflict",
  EVENT_NOT_ACTIVE: "state-conflict",
  PAUSED: "state-conflict",
  NOT_PAUSED: "state-conflict",
  EVENT_ALREADY_REGISTERED: "state-conflict",
  ISSUANCE_MODE_MISMATCH: "state-conflict",
  GRANT_CONSUMED: "state-conflict",

  // Resource
  NOT_FOUND: "resource",
  EVENT_NOT_REGISTERED: "resource",
  NOTHING_TO_WITHDRAW: "resource",

  // Payout
  TRANSFER_FAILED: "payout",
} as const satisfies Record<string, ErrorKind>;

export type DomainErrorCode = keyof typeof ERROR_KINDS;

export function errorKindOf(code: DomainErrorCode): ErrorKind {
  return ERROR_KINDS[code];
}
