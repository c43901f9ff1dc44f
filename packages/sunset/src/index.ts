/**
 * @afterword/sunset — Winding a legacy down.
 *
 * @packageDocumentation
 */

export type { PostSunsetLicense, SunsetState } from "./types.js";
export { POST_SUNSET_LICENSES, isPostSunsetLicense } from "./types.js";

export type { SunsetCoordinatorOptions, SunsetStep } from "./sunset-coordinator.js";
export { SunsetCoordinator } from "./sunset-coordinator.js";
