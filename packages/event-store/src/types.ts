/**
 * @proofpass/event-store — Core types.
 *
 * Committed domain events are appended to named streams
 * ("attendance", "collectible", "attestation", "events") and to one
 * global, hash-chained log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Concurrency control via expected version (optimistic locking)
 * - Every stored event links to its predecessor by hash
 */

import type { DomainEvent, EventMetadata } from "@proofpass/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A DomainEvent as persisted, with its stream position, global position
 * and chain link.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  readonly streamId: string;

  /** Position within this stream (1-based, contiguous) */
  readonly version: number;

  /** Position across all streams (1-based, contiguous) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content plus `previousHash` */
  readonly hash: string;

  /** Hash of the event at the previous global position, or GENESIS_HASH */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive, 1-based. Default: 1 (forward) or the stream head (backward) */
  readonly fromVersion?: number | undefined;
  readonly maxCount?: number | undefined;
  readonly direction?: ReadDirection | undefined;
}

export interface ReadAllOptions {
  /** Inclusive. Default: 1 (forward) or the log head (backward) */
  readonly fromPosition?: number | undefined;
  readonly maxCount?: number | undefined;
  readonly direction?: ReadDirection | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions and global positions have no gaps
 * - Subscribers see events in order, after they are stored
 */
export interface EventStore {
  /**
   * Append events to a stream, all or nothing.
   * @throws EventStoreError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, or 0. */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, or 0. */
  globalPosition(): number;

  /** Recompute the hash chain over every stored event. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash checked out */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
