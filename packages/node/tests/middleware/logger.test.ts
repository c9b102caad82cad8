/**
 * Tests for request logging.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { CREATOR, createTestApp, jsonRequest } from "../setup.js";

describe("loggerMiddleware", () => {
  it("logs one entry per request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, (entry) => entries.push(entry));

    await app.request(new Request("http://localhost/health", { headers: { "X-Request-Id": "r-1" } }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "r-1",
    });
    expect(entries[0]?.caller).toBeUndefined();
  });

  it("records the caller and the error status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, (entry) => entries.push(entry));

    await app.request(
      jsonRequest("/api/v1/events", "POST", { name: "", imageRef: "x" }, CREATOR),
    );

    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/events",
      status: 400,
      caller: CREATOR,
    });
  });
});
