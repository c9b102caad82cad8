/**
 * @proofpass/event-store — Event Catalog.
 *
 * Every domain event type is registered with:
 * - The stream it is appended to
 * - The component that emits it
 * - A payload validator
 *
 * The runtime refuses to emit a type the catalog doesn't know, or a
 * payload its validator rejects.
 */

import type { EventSource } from "@proofpass/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "collectible.token.paired") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  /** Stream the event is appended to */
  readonly stream: string;

  /** Returns true if the payload is valid for this version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of all domain event types.
 *
 * ```ts
 * const catalog = new EventCatalog();
 * catalog.register({
 *   type: "attestation.recorded",
 *   version: 1,
 *   description: "An attendance or upgrade attestation was recorded",
 *   source: "attestation",
 *   stream: "attestation",
 *   validate: (p) => typeof p === "object" && p !== null && "attestationId" in p,
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same version is a no-op;
   * a different version replaces the schema.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer`,
      );
    }
    if (this._schemas.get(schema.type)?.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  /**
   * Look up a schema, throwing CatalogError for unknown types.
   */
  requireSchema(eventType: string): EventSchema {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }
    return schema;
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return this.listSchemas().filter((schema) => schema.source === source);
  }

  listByStream(stream: string): readonly EventSchema[] {
    return this.listSchemas().filter((schema) => schema.stream === stream);
  }

  /**
   * False for unregistered types.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
