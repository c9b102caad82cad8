/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Domain errors keep their code; the status follows
 * the code's kind:
 *
 *   validation → 400, authorization → 403, state-conflict → 409,
 *   resource → 404, payout → 502
 *
 * with a few codes mapped individually (payment and ledger codes).
 * Anything unrecognized is a 500 that does not leak its message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ErrorKind } from "@proofpass/types";
import { errorKindOf, isDomainErrorCode } from "@proofpass/types";
import { createErrorEnvelope } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

const KIND_STATUS: Record<ErrorKind, ContentfulStatusCode> = {
  validation: 400,
  authorization: 403,
  "state-conflict": 409,
  resource: 404,
  payout: 502,
};

const CODE_STATUS: Readonly<Record<string, ContentfulStatusCode>> = {
  // Payment too small for the configured fee
  INSUFFICIENT_FEE: 422,

  // Ledger errors
  INSUFFICIENT_BALANCE: 422,
  UNKNOWN_ACCOUNT: 404,
  DUPLICATE_ACCOUNT: 409,
  INVALID_AMOUNT: 400,
  RECEIVER_REJECTED: 502,
};

export function statusForCode(code: string): ContentfulStatusCode {
  const mapped = CODE_STATUS[code];
  if (mapped !== undefined) {
    return mapped;
  }
  return isDomainErrorCode(code) ? KIND_STATUS[errorKindOf(code)] : 500;
}

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof RequestValidationError) {
    return c.json(
      createErrorEnvelope(
        "VALIDATION_ERROR",
        err.message,
        err.issues.length > 0 ? { issues: err.issues } : undefined,
      ),
      400,
    );
  }

  if (err instanceof HTTPException) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), err.status);
  }

  const code = codeOf(err);
  const status = code !== undefined ? statusForCode(code) : 500;
  if (code === undefined || status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
