/**
 * @proofpass/node — HTTP service for a Proofpass deployment.
 *
 * Importing this module starts nothing; main.ts is the executable.
 *
 * @packageDocumentation
 */

export { ProofpassService } from "./services/proofpass-service.js";
export type { ProofpassServiceConfig, HealthReport } from "./services/proofpass-service.js";
export { loadConfig, deploymentConfigFrom, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
