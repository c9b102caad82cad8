/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: event-store hash chain and ledger conservation
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const { integrity, conservation } = service.checkHealth();

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${String(integrity.errors.length)}`,
        };
    const ledger: SubsystemStatus = conservation.balanced
      ? { status: "ok" }
      : {
          status: "down",
          detail: `issued=${conservation.totalIssued.toString()}, held=${conservation.totalHeld.toString()}`,
        };

    const ready = service.isReady() && integrity.valid && conservation.balanced;
    const body = {
      status: ready ? "ready" : "not_ready",
      subsystems: { eventStore, ledger },
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
