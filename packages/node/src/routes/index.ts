/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createIntentRoutes } from "./intents.js";
export { createTriggerRoutes } from "./triggers.js";
export { createOracleRoutes } from "./oracles.js";
export { createResolutionRoutes } from "./resolution.js";
export { createExecutionRoutes } from "./execution.js";
export { createSunsetRoutes } from "./sunset.js";
export { createEventRoutes } from "./events.js";
