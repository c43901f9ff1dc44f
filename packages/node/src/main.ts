/**
 * @afterword/node — Server entry point.
 *
 * Loads config, bootstraps the Hono app, starts the HTTP server and
 * handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys, parseIdentityList } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import { pinoRequestLog } from "./middleware/logger.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, callers are named by the X-Actor-Id header");
  }

  const { app } = createApp({
    serviceConfig: {
      admin: config.ADMIN_IDENTITY,
      executors: parseIdentityList(config.EXECUTOR_IDENTITIES),
      indexers: parseIdentityList(config.INDEXER_IDENTITIES),
      sunsetOperators: parseIdentityList(config.SUNSET_OPERATOR_IDENTITIES),
      recoverers: parseIdentityList(config.RECOVERY_IDENTITIES),
      logger,
    },
    logFn: pinoRequestLog(logger),
    logger,
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Afterword node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
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
