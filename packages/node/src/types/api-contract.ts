/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { Address } from "@proofpass/types";
import type { ProofpassService } from "../services/proofpass-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    service: ProofpassService;

    /** Verified X-Caller address (set by requireCaller on mutating routes) */
    caller: Address;
  };
}
