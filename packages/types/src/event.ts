/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed state change in Proofpass is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which transaction)
 * - Events emitted inside a rolled-back transaction are never published
 * - No UPDATE, no DELETE: only new events
 */

/** Which Proofpass component emitted an event. */
export type EventSource =
  | "attendance"
  | "collectible"
  | "attestation"
  | "coordinator";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address of the caller that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string | undefined;

  /** Shared by every event committed in the same transaction */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event in the Proofpass system.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "attendance.token.issued") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
