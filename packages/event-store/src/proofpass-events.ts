/**
 * @proofpass/event-store — Domain Event Definitions.
 *
 * The catalog of every event the registries and the coordinator emit.
 *
 * Naming convention: `<component>.<entity>.<action>`
 * Streams: "attendance", "collectible", "attestation", "events"
 *
 * Payloads are plain JSON: addresses and refs as hex strings, token ids
 * as numbers, wei amounts as decimal strings.
 */

import { isAddress, isEventRef } from "@proofpass/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Attendance Events
// =============================================================================

export interface AttendanceIssuedPayload {
  readonly tokenId: number;
  readonly recipient: string;
  readonly eventRef: string;
  readonly metadataURI: string;
}

export interface AttendanceVoidedPayload {
  readonly tokenId: number;
  readonly owner: string;
}

export interface AttendanceCompanionedPayload {
  readonly tokenId: number;
  readonly collectibleRegistry: string;
}

export interface IssuerUpdatedPayload {
  readonly issuer: string;
}

export interface AllowListUpdatedPayload {
  readonly account: string;
  readonly allowed: boolean;
}

export interface VoiderUpdatedPayload {
  readonly voider: string;
}

export interface BaseURIUpdatedPayload {
  readonly baseURI: string;
}

// =============================================================================
// Collectible Events
// =============================================================================

export interface CollectiblePairedPayload {
  readonly payer: string;
  readonly attendanceTokenId: number;
  readonly collectibleId: number;
  readonly feeCharged: string;
}

export interface FeeDistributedPayload {
  readonly organizer: string;
  readonly treasuryAmount: string;
  readonly organizerAmount: string;
  readonly refund: string;
}

export interface CollectibleTransferredPayload {
  readonly tokenId: number;
  readonly from: string;
  readonly to: string;
}

export interface ApprovalUpdatedPayload {
  readonly owner: string;
  readonly operator: string;
  readonly tokenId?: number | undefined;
  readonly approved: boolean;
}

export interface ConfigUpdatedPayload {
  readonly field: string;
  readonly value: string;
}

export interface PauseChangedPayload {
  readonly by: string;
}

export interface FundsWithdrawnPayload {
  readonly to: string;
  readonly amount: string;
}

// =============================================================================
// Attestation Events
// =============================================================================

export interface AttestationRecordedPayload {
  readonly attestationId: string;
  readonly eventRef: string;
  readonly holder: string;
  readonly tokenId: number;
  readonly isUpgrade: boolean;
}

// =============================================================================
// Coordinator Events
// =============================================================================

export interface EventCreatedPayload {
  readonly eventRef: string;
  readonly creator: string;
  readonly name: string;
  readonly description: string;
  readonly imageRef: string;
  readonly maxAttendees: number;
}

export interface EventRegisteredPayload {
  readonly eventRef: string;
  readonly metadata: string;
}

export interface EventUpdatedPayload {
  readonly eventRef: string;
  readonly name: string;
  readonly description: string;
  readonly imageRef: string;
}

export interface EventStatusChangedPayload {
  readonly eventRef: string;
  readonly active: boolean;
}

export interface ContractsUpdatedPayload {
  readonly attendance: string;
  readonly collectible: string;
  readonly attestation: string;
}

export interface AttendanceMintedPayload {
  readonly eventRef: string;
  readonly recipient: string;
  readonly tokenId: number;
  readonly attestationId: string;
}

export interface CollectiblePairedWithAttestationPayload {
  readonly eventRef: string;
  readonly payer: string;
  readonly attendanceTokenId: number;
  readonly collectibleId: number;
  readonly attestationId: string;
}

// =============================================================================
// Shared
// =============================================================================

export interface AdminTransferredPayload {
  readonly previousAdmin: string;
  readonly newAdmin: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const PROOFPASS_EVENTS = {
  // Attendance
  ATTENDANCE_ISSUED: "attendance.token.issued",
  ATTENDANCE_VOIDED: "attendance.token.voided",
  ATTENDANCE_COMPANIONED: "attendance.token.companioned",
  ISSUER_UPDATED: "attendance.issuer.updated",
  ALLOWLIST_UPDATED: "attendance.allowlist.updated",
  VOIDER_UPDATED: "attendance.voider.updated",
  ATTENDANCE_BASE_URI_UPDATED: "attendance.base-uri.updated",
  ATTENDANCE_ADMIN_TRANSFERRED: "attendance.admin.transferred",

  // Collectible
  COLLECTIBLE_PAIRED: "collectible.token.paired",
  FEE_DISTRIBUTED: "collectible.fee.distributed",
  COLLECTIBLE_TRANSFERRED: "collectible.token.transferred",
  APPROVAL_UPDATED: "collectible.approval.updated",
  CONFIG_UPDATED: "collectible.config.updated",
  PAUSED: "collectible.paused",
  UNPAUSED: "collectible.unpaused",
  FUNDS_WITHDRAWN: "collectible.funds.withdrawn",
  COLLECTIBLE_ADMIN_TRANSFERRED: "collectible.admin.transferred",

  // Attestation
  ATTESTATION_RECORDED: "attestation.recorded",
  ATTESTATION_ADMIN_TRANSFERRED: "attestation.admin.transferred",

  // Coordinator
  EVENT_CREATED: "coordinator.event.created",
  EVENT_REGISTERED: "coordinator.event.registered",
  EVENT_UPDATED: "coordinator.event.updated",
  EVENT_STATUS_CHANGED: "coordinator.event.status-changed",
  ATTENDANCE_MINTED: "coordinator.attendance.minted",
  COLLECTIBLE_PAIRED_WITH_ATTESTATION: "coordinator.collectible.paired",
  COORDINATOR_ADMIN_TRANSFERRED: "coordinator.admin.transferred",
  CONTRACTS_UPDATED: "coordinator.contracts.updated",
} as const;

export type ProofpassEventType =
  (typeof PROOFPASS_EVENTS)[keyof typeof PROOFPASS_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

type Check = (p: Record<string, unknown>) => boolean;

const str =
  (key: string): Check =>
  (p) =>
    typeof p[key] === "string";

const bool =
  (key: string): Check =>
  (p) =>
    typeof p[key] === "boolean";

const tokenId =
  (key: string): Check =>
  (p) => {
    const value = p[key];
    return typeof value === "number" && Number.isInteger(value) && value >= 0;
  };

const address =
  (key: string): Check =>
  (p) =>
    isAddress(p[key]);

const ref =
  (key: string): Check =>
  (p) =>
    isEventRef(p[key]);

/** Non-negative wei amount as a decimal string. */
const wei =
  (key: string): Check =>
  (p) => {
    const value = p[key];
    return typeof value === "string" && /^\d+$/.test(value);
  };

const adminTransferred = shape(address("previousAdmin"), address("newAdmin"));

function shape(...checks: readonly Check[]): (payload: unknown) => boolean {
  return (payload) => {
    if (typeof payload !== "object" || payload === null) {
      return false;
    }
    const record = payload as Record<string, unknown>;
    return checks.every((check) => check(record));
  };
}

const ATTENDANCE_SCHEMAS: readonly EventSchema[] = [
  {
    type: PROOFPASS_EVENTS.ATTENDANCE_ISSUED,
    version: 1,
    description: "An attendance token was issued",
    source: "attendance",
    stream: "attendance",
    validate: shape(tokenId("tokenId"), address("recipient"), ref("eventRef"), str("metadataURI")),
  },
  {
    type: PROOFPASS_EVENTS.ATTENDANCE_VOIDED,
    version: 1,
    description: "An attendance token was voided by an upgrade",
    source: "attendance",
    stream: "attendance",
    validate: shape(tokenId("tokenId"), address("owner")),
  },
  {
    type: PROOFPASS_EVENTS.ATTENDANCE_COMPANIONED,
    version: 1,
    description: "An attendance token was marked as paired with a collectible",
    source: "attendance",
    stream: "attendance",
    validate: shape(tokenId("tokenId"), address("collectibleRegistry")),
  },
  {
    type: PROOFPASS_EVENTS.ISSUER_UPDATED,
    version: 1,
    description: "The signature issuer changed",
    source: "attendance",
    stream: "attendance",
    validate: shape(address("issuer")),
  },
  {
    type: PROOFPASS_EVENTS.ALLOWLIST_UPDATED,
    version: 1,
    description: "An account was added to or removed from the issuer allow-list",
    source: "attendance",
    stream: "attendance",
    validate: shape(address("account"), bool("allowed")),
  },
  {
    type: PROOFPASS_EVENTS.VOIDER_UPDATED,
    version: 1,
    description: "The authorized voider changed",
    source: "attendance",
    stream: "attendance",
    validate: shape(address("voider")),
  },
  {
    type: PROOFPASS_EVENTS.ATTENDANCE_BASE_URI_UPDATED,
    version: 1,
    description: "The attendance base URI changed",
    source: "attendance",
    stream: "attendance",
    validate: shape(str("baseURI")),
  },
  {
    type: PROOFPASS_EVENTS.ATTENDANCE_ADMIN_TRANSFERRED,
    version: 1,
    description: "The attendance registry administrator changed",
    source: "attendance",
    stream: "attendance",
    validate: adminTransferred,
  },
];

const COLLECTIBLE_SCHEMAS: readonly EventSchema[] = [
  {
    type: PROOFPASS_EVENTS.COLLECTIBLE_PAIRED,
    version: 1,
    description: "A collectible was minted for an attendance token",
    source: "collectible",
    stream: "collectible",
    validate: shape(
      address("payer"),
      tokenId("attendanceTokenId"),
      tokenId("collectibleId"),
      wei("feeCharged"),
    ),
  },
  {
    type: PROOFPASS_EVENTS.FEE_DISTRIBUTED,
    version: 1,
    description: "An upgrade fee was split between treasury and organizer",
    source: "collectible",
    stream: "collectible",
    validate: shape(
      address("organizer"),
      wei("treasuryAmount"),
      wei("organizerAmount"),
      wei("refund"),
    ),
  },
  {
    type: PROOFPASS_EVENTS.COLLECTIBLE_TRANSFERRED,
    version: 1,
    description: "A collectible changed hands",
    source: "collectible",
    stream: "collectible",
    validate: shape(tokenId("tokenId"), address("from"), address("to")),
  },
  {
    type: PROOFPASS_EVENTS.APPROVAL_UPDATED,
    version: 1,
    description: "A collectible approval or operator approval changed",
    source: "collectible",
    stream: "collectible",
    validate: shape(address("owner"), address("operator"), bool("approved")),
  },
  {
    type: PROOFPASS_EVENTS.CONFIG_UPDATED,
    version: 1,
    description: "A collectible registry setting changed",
    source: "collectible",
    stream: "collectible",
    validate: shape(str("field"), str("value")),
  },
  {
    type: PROOFPASS_EVENTS.PAUSED,
    version: 1,
    description: "Pairing was paused",
    source: "collectible",
    stream: "collectible",
    validate: shape(address("by")),
  },
  {
    type: PROOFPASS_EVENTS.UNPAUSED,
    version: 1,
    description: "Pairing was resumed",
    source: "collectible",
    stream: "collectible",
    validate: shape(address("by")),
  },
  {
    type: PROOFPASS_EVENTS.FUNDS_WITHDRAWN,
    version: 1,
    description: "Stray value held by the registry was withdrawn",
    source: "collectible",
    stream: "collectible",
    validate: shape(address("to"), wei("amount")),
  },
  {
    type: PROOFPASS_EVENTS.COLLECTIBLE_ADMIN_TRANSFERRED,
    version: 1,
    description: "The collectible registry administrator changed",
    source: "collectible",
    stream: "collectible",
    validate: adminTransferred,
  },
];

const ATTESTATION_SCHEMAS: readonly EventSchema[] = [
  {
    type: PROOFPASS_EVENTS.ATTESTATION_RECORDED,
    version: 1,
    description: "An attendance or upgrade attestation was recorded",
    source: "attestation",
    stream: "attestation",
    validate: shape(
      ref("attestationId"),
      ref("eventRef"),
      address("holder"),
      tokenId("tokenId"),
      bool("isUpgrade"),
    ),
  },
  {
    type: PROOFPASS_EVENTS.ATTESTATION_ADMIN_TRANSFERRED,
    version: 1,
    description: "The attestation log administrator changed",
    source: "attestation",
    stream: "attestation",
    validate: adminTransferred,
  },
];

const COORDINATOR_SCHEMAS: readonly EventSchema[] = [
  {
    type: PROOFPASS_EVENTS.EVENT_CREATED,
    version: 1,
    description: "An organizer created an event",
    source: "coordinator",
    stream: "events",
    validate: shape(
      ref("eventRef"),
      address("creator"),
      str("name"),
      str("description"),
      str("imageRef"),
      tokenId("maxAttendees"),
    ),
  },
  {
    type: PROOFPASS_EVENTS.EVENT_REGISTERED,
    version: 1,
    description: "An event was registered on the admin path",
    source: "coordinator",
    stream: "events",
    validate: shape(ref("eventRef"), str("metadata")),
  },
  {
    type: PROOFPASS_EVENTS.EVENT_UPDATED,
    version: 1,
    description: "An event's descriptive fields changed",
    source: "coordinator",
    stream: "events",
    validate: shape(ref("eventRef"), str("name"), str("description"), str("imageRef")),
  },
  {
    type: PROOFPASS_EVENTS.EVENT_STATUS_CHANGED,
    version: 1,
    description: "An event was activated or deactivated",
    source: "coordinator",
    stream: "events",
    validate: shape(ref("eventRef"), bool("active")),
  },
  {
    type: PROOFPASS_EVENTS.ATTENDANCE_MINTED,
    version: 1,
    description: "An attendance token was minted and attested",
    source: "coordinator",
    stream: "events",
    validate: shape(
      ref("eventRef"),
      address("recipient"),
      tokenId("tokenId"),
      ref("attestationId"),
    ),
  },
  {
    type: PROOFPASS_EVENTS.COLLECTIBLE_PAIRED_WITH_ATTESTATION,
    version: 1,
    description: "A collectible was paired and the upgrade attested",
    source: "coordinator",
    stream: "events",
    validate: shape(
      ref("eventRef"),
      address("payer"),
      tokenId("attendanceTokenId"),
      tokenId("collectibleId"),
      ref("attestationId"),
    ),
  },
  {
    type: PROOFPASS_EVENTS.COORDINATOR_ADMIN_TRANSFERRED,
    version: 1,
    description: "The coordinator administrator changed",
    source: "coordinator",
    stream: "events",
    validate: adminTransferred,
  },
  {
    type: PROOFPASS_EVENTS.CONTRACTS_UPDATED,
    version: 1,
    description: "The coordinator was pointed at different registries",
    source: "coordinator",
    stream: "events",
    validate: shape(address("attendance"), address("collectible"), address("attestation")),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every Proofpass domain event registered
 * at version 1.
 */
export function createProofpassCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  for (const schema of [
    ...ATTENDANCE_SCHEMAS,
    ...COLLECTIBLE_SCHEMAS,
    ...ATTESTATION_SCHEMAS,
    ...COORDINATOR_SCHEMAS,
  ]) {
    catalog.register(schema);
  }

  return catalog;
}
