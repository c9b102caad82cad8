/**
 * @proofpass/runtime — Execution runtime.
 *
 * Every state transition of the registries runs inside `atomically()`.
 * A transaction either commits completely (ledger movements, registry
 * state, domain events) or leaves no trace.
 *
 * Rules:
 * - Transactions are synchronous; returning a promise is an error
 * - Nested calls (receive hooks re-entering a registry) nest checkpoints
 * - Events are buffered and reach the event store only when the
 *   outermost transaction commits
 * - Every event committed by one transaction shares a correlation ID
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent } from "@proofpass/types";
import type { EventCatalog, EventStore } from "@proofpass/event-store";
import { InMemoryEventStore, createProofpassCatalog } from "@proofpass/event-store";
import { Ledger } from "@proofpass/ledger";
import type { Revertible, RuntimeOptions } from "./types.js";
import { RuntimeError } from "./types.js";

interface PendingEvent {
  readonly stream: string;
  readonly event: DomainEvent;
}

export class ExecutionRuntime {
  readonly ledger: Ledger;
  readonly eventStore: EventStore;
  readonly catalog: EventCatalog;

  private readonly _clock: () => Date;
  private readonly _generateId: () => string;
  private readonly _participants: Revertible[] = [];
  private readonly _pending: PendingEvent[] = [];
  private _depth = 0;
  private _correlationId: string | undefined;

  constructor(options?: RuntimeOptions) {
    this._clock = options?.clock ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
    this.ledger = options?.ledger ?? new Ledger({ clock: this._clock });
    this.eventStore =
      options?.eventStore ?? new InMemoryEventStore({ clock: this._clock });
    this.catalog = options?.catalog ?? createProofpassCatalog();
  }

  // ─── Participants ────────────────────────────────────────────────────

  /**
   * Register a component whose state rolls back with failed transactions.
   */
  attach(participant: Revertible): void {
    if (!this._participants.includes(participant)) {
      this._participants.push(participant);
    }
  }

  // ─── Clock ───────────────────────────────────────────────────────────

  now(): Date {
    return this._clock();
  }

  /** Current time in whole seconds. */
  unixTime(): number {
    return Math.floor(this._clock().getTime() / 1000);
  }

  // ─── Transactions ────────────────────────────────────────────────────

  get inTransaction(): boolean {
    return this._depth > 0;
  }

  /** Correlation ID of the transaction in progress, if any. */
  get correlationId(): string | undefined {
    return this._correlationId;
  }

  /**
   * Run `fn` as one all-or-nothing state transition.
   *
   * On throw: the ledger and every attached participant are restored in
   * reverse order, events emitted inside are dropped, and the error is
   * rethrown unchanged.
   */
  atomically<T>(fn: () => T): T {
    const restores = [
      this.ledger.checkpoint(),
      ...this._participants.map((participant) => participant.checkpoint()),
    ];
    const pendingMark = this._pending.length;
    const outermost = this._depth === 0;
    if (outermost) {
      this._correlationId = this._generateId();
    }

    this._depth++;
    let result: T;
    try {
      result = fn();
      if (isThenable(result)) {
        throw new RuntimeError(
          "ASYNC_TRANSACTION",
          "Transactions must be synchronous; await before entering atomically()",
        );
      }
    } catch (err) {
      for (const restore of restores.reverse()) {
        restore();
      }
      this._pending.length = pendingMark;
      throw err;
    } finally {
      this._depth--;
      if (outermost) {
        this._correlationId = undefined;
      }
    }

    if (outermost) {
      this._flush();
    }
    return result;
  }

  // ─── Events ──────────────────────────────────────────────────────────

  /**
   * Emit a domain event. The catalog supplies its stream and source and
   * validates the payload. Outside a transaction the event commits on
   * its own.
   */
  emit(type: string, actor: string, payload: Readonly<Record<string, unknown>>): void {
    if (this._depth === 0) {
      this.atomically(() => this.emit(type, actor, payload));
      return;
    }

    const schema = this.catalog.getSchema(type);
    if (schema === undefined) {
      throw new RuntimeError("UNKNOWN_EVENT_TYPE", `Unknown event type "${type}"`);
    }
    if (!schema.validate(payload)) {
      throw new RuntimeError(
        "INVALID_EVENT_PAYLOAD",
        `Payload does not match schema for "${type}"`,
      );
    }

    this._pending.push({
      stream: schema.stream,
      event: {
        type,
        metadata: {
          eventId: this._generateId(),
          timestamp: this._clock().toISOString(),
          actor,
          correlationId: this._correlationId ?? this._generateId(),
          source: schema.source,
        },
        payload,
      },
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _flush(): void {
    const committed = this._pending.splice(0, this._pending.length);
    for (const { stream, event } of committed) {
      this.eventStore.append(stream, [event]);
    }
  }
}

function isThenable(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
