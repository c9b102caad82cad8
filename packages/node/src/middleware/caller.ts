/**
 * Caller identity.
 *
 * Every mutating route acts on behalf of the address in the X-Caller
 * header. There is no signature check at this layer: the service is
 * meant to sit behind a gateway that authenticates wallets.
 */

import type { MiddlewareHandler } from "hono";
import { isAddress } from "@proofpass/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller";

/**
 * 401 MISSING_CALLER without the header, 400 VALIDATION_ERROR when it
 * is not an address. Sets `caller` otherwise.
 */
export function requireCaller(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const raw = c.req.header(CALLER_HEADER);
    if (raw === undefined || raw === "") {
      return c.json(
        createErrorEnvelope("MISSING_CALLER", `${CALLER_HEADER} header is required`),
        401,
      );
    }
    if (!isAddress(raw)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `${CALLER_HEADER} must be a 20-byte hex address`),
        400,
      );
    }

    c.set("caller", raw);
    await next();
  };
}
