/**
 * @proofpass/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Proofpass domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { HashableEvent } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Proofpass domain events
export { PROOFPASS_EVENTS, createProofpassCatalog } from "./proofpass-events.js";
export type {
  ProofpassEventType,
  AttendanceIssuedPayload,
  AttendanceVoidedPayload,
  AttendanceCompanionedPayload,
  IssuerUpdatedPayload,
  AllowListUpdatedPayload,
  VoiderUpdatedPayload,
  BaseURIUpdatedPayload,
  CollectiblePairedPayload,
  FeeDistributedPayload,
  CollectibleTransferredPayload,
  ApprovalUpdatedPayload,
  ConfigUpdatedPayload,
  PauseChangedPayload,
  FundsWithdrawnPayload,
  AttestationRecordedPayload,
  EventCreatedPayload,
  EventRegisteredPayload,
  EventUpdatedPayload,
  EventStatusChangedPayload,
  ContractsUpdatedPayload,
  AttendanceMintedPayload,
  CollectiblePairedWithAttestationPayload,
  AdminTransferredPayload,
} from "./proofpass-events.js";
