/**
 * @proofpass/node — Entry point.
 *
 * Loads config, builds the deployment, starts the HTTP server and
 * handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, deploymentConfigFrom } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.ENABLE_FAUCET && config.NODE_ENV === "production") {
    logger.warn("Faucet enabled in production: anyone can create value");
  }

  const { app, service } = createApp({
    service: {
      deployment: deploymentConfigFrom(config),
      logger,
      enableFaucet: config.ENABLE_FAUCET,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
  });

  logger.info(
    {
      addresses: service.deployment.addresses,
      issuanceMode: config.ISSUANCE_MODE,
      variant: config.UPGRADE_VARIANT,
      fee: config.UPGRADE_FEE.toString(),
    },
    "Deployment created",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Proofpass node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.stop();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
