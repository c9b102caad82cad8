/**
 * Domain event stream.
 *
 * GET /api/v1/stream?fromPosition=&limit= — Committed events in global order
 *
 * Clients poll with `fromPosition` set to the returned `nextPosition`.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { StreamQuerySchema } from "../types/dto.js";
import { parseInput } from "../middleware/validate.js";

export function createStreamRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseInput(StreamQuerySchema, c.req.query(), "Invalid query parameters");
    const fromPosition = query.fromPosition ?? 1;
    const events = c.get("service").readAllEvents({
      fromPosition,
      maxCount: query.limit,
    });
    const last = events[events.length - 1];

    return c.json({
      data: events,
      nextPosition: last === undefined ? fromPosition : last.globalPosition + 1,
    });
  });

  return routes;
}
