/**
 * @afterword/node — HTTP service over the Afterword components.
 *
 * Importing this module never starts a server; `main.ts` does.
 *
 * @packageDocumentation
 */

export { AfterwordService, TRIGGER_COORDINATOR_IDENTITY, SUNSET_COORDINATOR_IDENTITY } from "./services/afterword-service.js";
export type { AfterwordServiceConfig } from "./services/afterword-service.js";
export { loadConfig, parseApiKeys, parseIdentityList, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
