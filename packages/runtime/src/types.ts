/**
 * @proofpass/runtime — Types.
 */

import type { EventCatalog, EventStore } from "@proofpass/event-store";
import type { Ledger } from "@proofpass/ledger";

/**
 * Anything whose state must roll back with a failed transaction.
 * `checkpoint()` captures the current state and returns a function
 * that puts it back.
 */
export interface Revertible {
  checkpoint(): () => void;
}

export interface RuntimeOptions {
  readonly ledger?: Ledger | undefined;
  readonly eventStore?: EventStore | undefined;
  readonly catalog?: EventCatalog | undefined;

  /** Source of timestamps for records and events. Defaults to the wall clock. */
  readonly clock?: (() => Date) | undefined;

  /** Generates event and correlation IDs. Defaults to `crypto.randomUUID`. */
  readonly generateId?: (() => string) | undefined;
}

export type RuntimeErrorCode =
  | "UNKNOWN_EVENT_TYPE"
  | "INVALID_EVENT_PAYLOAD"
  | "ASYNC_TRANSACTION";

export class RuntimeError extends Error {
  public readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}
