/**
 * Event routes.
 *
 * POST   /api/v1/events                   — Create an event (caller = creator)
 * GET    /api/v1/events                   — List events (registration order)
 * GET    /api/v1/events/:ref              — Get one event
 * PATCH  /api/v1/events/:ref              — Edit name, description, image (creator)
 * POST   /api/v1/events/:ref/status       — Activate or deactivate (creator)
 * GET    /api/v1/events/:ref/attendance   — Attestations for the event
 * GET    /api/v1/events/:ref/remaining    — Remaining capacity
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateEventSchema,
  EventRefSchema,
  EventStatusSchema,
  PaginationQuerySchema,
  UpdateEventSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { eventView } from "../types/views.js";
import { requireCaller } from "../middleware/caller.js";
import { parseInput, readBody } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requireCaller(), async (c) => {
    const body = await readBody(c, CreateEventSchema);
    const { coordinator } = c.get("service");

    const eventRef = coordinator.createEvent(c.get("caller"), body);
    return c.json({ data: eventView(requireRecord(coordinator.getEvent(eventRef))) }, 201);
  });

  routes.get("/", (c) => {
    const { coordinator } = c.get("service");
    return c.json({ data: coordinator.listEvents().map(eventView) });
  });

  routes.get("/:ref", (c) => {
    const ref = parseInput(EventRefSchema, c.req.param("ref"), "Invalid event reference");
    const record = c.get("service").coordinator.getEvent(ref);

    if (record === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Event '${ref}' not found`), 404);
    }
    return c.json({ data: eventView(record) });
  });

  routes.patch("/:ref", requireCaller(), async (c) => {
    const ref = parseInput(EventRefSchema, c.req.param("ref"), "Invalid event reference");
    const body = await readBody(c, UpdateEventSchema);
    const { coordinator } = c.get("service");

    coordinator.updateEvent(c.get("caller"), ref, body);
    return c.json({ data: eventView(requireRecord(coordinator.getEvent(ref))) });
  });

  routes.post("/:ref/status", requireCaller(), async (c) => {
    const ref = parseInput(EventRefSchema, c.req.param("ref"), "Invalid event reference");
    const { active } = await readBody(c, EventStatusSchema);
    const { coordinator } = c.get("service");

    coordinator.setEventStatus(c.get("caller"), ref, active);
    return c.json({ data: eventView(requireRecord(coordinator.getEvent(ref))) });
  });

  routes.get("/:ref/attendance", (c) => {
    const ref = parseInput(EventRefSchema, c.req.param("ref"), "Invalid event reference");
    const query = parseInput(PaginationQuerySchema, c.req.query(), "Invalid query parameters");
    const attestations = c.get("service").coordinator.getEventAttendance(ref);

    return c.json(paginate(attestations, query, (a) => a.sequence, "sequence"));
  });

  routes.get("/:ref/remaining", (c) => {
    const ref = parseInput(EventRefSchema, c.req.param("ref"), "Invalid event reference");
    const remainingSpots = c.get("service").coordinator.getRemainingSpots(ref);
    return c.json({ data: { eventRef: ref, remainingSpots } });
  });

  return routes;
}

function requireRecord<T>(record: T | undefined): T {
  if (record === undefined) {
    throw new Error("Event missing after a committed write");
  }
  return record;
}
