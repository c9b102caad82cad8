/**
 * Attendance token routes.
 *
 * POST /api/v1/attendance/mint — Mint and attest (coordinator path)
 * GET  /api/v1/attendance/:id  — Token with its URI
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { MintSchema, TokenIdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { attendanceView } from "../types/views.js";
import { requireCaller } from "../middleware/caller.js";
import { parseInput, readBody } from "../middleware/validate.js";

export function createAttendanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/mint", requireCaller(), async (c) => {
    const body = await readBody(c, MintSchema);
    const service = c.get("service");

    const result = await service.coordinator.mintWithAttestation(c.get("caller"), body);
    return c.json({ data: result }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parseInput(TokenIdParamSchema, c.req.param("id"), "Invalid token id");
    const { attendance } = c.get("service");
    const token = attendance.getToken(id);

    if (token === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Attendance token ${String(id)} not found`), 404);
    }
    return c.json({ data: attendanceView(token, attendance.tokenURI(id)) });
  });

  return routes;
}
