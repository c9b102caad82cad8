/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts so tests can create the app without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { ProofpassService } from "./services/proofpass-service.js";
import type { ProofpassServiceConfig } from "./services/proofpass-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createEventRoutes } from "./routes/events.js";
import { createAttendanceRoutes } from "./routes/attendance.js";
import { createCollectibleRoutes } from "./routes/collectibles.js";
import { createAttestationRoutes } from "./routes/attestation.js";
import { createStreamRoutes } from "./routes/stream.js";
import { createBalanceRoutes } from "./routes/balances.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** An existing service, or the config to build one from. */
  readonly service: ProofpassService | ProofpassServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ProofpassService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service =
    options.service instanceof ProofpassService
      ? options.service
      : new ProofpassService(options.service);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.onError(handleError);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/attendance", createAttendanceRoutes());
  app.route("/api/v1/collectibles", createCollectibleRoutes());
  app.route("/api/v1/stream", createStreamRoutes());
  app.route("/api/v1", createAttestationRoutes());
  app.route("/api/v1", createBalanceRoutes());

  return { app, service };
}
