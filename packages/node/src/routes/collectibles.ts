/**
 * Collectible routes.
 *
 * POST /api/v1/collectibles/pair                         — Pay and pair (caller = payer)
 * GET  /api/v1/collectibles/can-pair/:attendanceTokenId  — Pre-flight for X-Caller
 * GET  /api/v1/collectibles/:id                          — Token with its URI
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PairSchema, TokenIdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { collectibleView, pairView } from "../types/views.js";
import { requireCaller } from "../middleware/caller.js";
import { parseInput, readBody } from "../middleware/validate.js";

export function createCollectibleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/pair", requireCaller(), async (c) => {
    const body = await readBody(c, PairSchema);
    const result = c.get("service").coordinator.pairWithAttestation(c.get("caller"), body);
    return c.json({ data: pairView(result) }, 201);
  });

  routes.get("/can-pair/:attendanceTokenId", requireCaller(), (c) => {
    const id = parseInput(
      TokenIdParamSchema,
      c.req.param("attendanceTokenId"),
      "Invalid attendance token id",
    );
    const result = c.get("service").collectible.canPair(id, c.get("caller"));
    return c.json({ data: result });
  });

  routes.get("/:id", (c) => {
    const id = parseInput(TokenIdParamSchema, c.req.param("id"), "Invalid token id");
    const { collectible } = c.get("service");
    const token = collectible.getToken(id);

    if (token === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Collectible ${String(id)} not found`), 404);
    }
    return c.json({ data: collectibleView(token, collectible.tokenURI(id)) });
  });

  return routes;
}
