/**
 * Attestation routes.
 *
 * GET /api/v1/attestations/:id                — One attestation
 * GET /api/v1/holders/:address/attestations   — Holder history (cursor pagination)
 * GET /api/v1/holders/:address/upgrades       — Holder's upgrade attestations
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, HexSchema, PaginationQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { parseInput } from "../middleware/validate.js";

export function createAttestationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/attestations/:id", (c) => {
    const id = parseInput(HexSchema, c.req.param("id"), "Invalid attestation id");
    const attestation = c.get("service").attestation.find(id);

    if (attestation === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Attestation '${id}' not found`), 404);
    }
    return c.json({ data: attestation });
  });

  routes.get("/holders/:address/attestations", (c) => {
    const holder = parseInput(AddressSchema, c.req.param("address"), "Invalid holder address");
    const query = parseInput(PaginationQuerySchema, c.req.query(), "Invalid query parameters");
    const history = c.get("service").coordinator.getUserAttendanceHistory(holder);

    return c.json(paginate(history, query, (a) => a.sequence, "sequence"));
  });

  routes.get("/holders/:address/upgrades", (c) => {
    const holder = parseInput(AddressSchema, c.req.param("address"), "Invalid holder address");
    return c.json({ data: c.get("service").coordinator.getUserUpgrades(holder) });
  });

  return routes;
}
