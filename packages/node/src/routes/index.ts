/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createEventRoutes } from "./events.js";
export { createAttendanceRoutes } from "./attendance.js";
export { createCollectibleRoutes } from "./collectibles.js";
export { createAttestationRoutes } from "./attestation.js";
export { createStreamRoutes } from "./stream.js";
export { createBalanceRoutes } from "./balances.js";
