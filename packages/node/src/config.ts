/**
 * @afterword/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Identity lists are comma-separated; API keys are `key:identity` pairs.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Capability grants
  ADMIN_IDENTITY: z.string().min(1).default("admin"),
  EXECUTOR_IDENTITIES: z.string().default(""),
  INDEXER_IDENTITIES: z.string().default(""),
  SUNSET_OPERATOR_IDENTITIES: z.string().default(""),
  RECOVERY_IDENTITIES: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly identity: string;
}

/**
 * Parse the API_KEYS env var.
 *
 * Format: "key1:identity1,key2:identity2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, identity] = parts;
    if (parts.length !== 2 || key === undefined || identity === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:identity`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (identity === "") {
      throw new Error("Identity cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS`);
    }
    seen.add(key);
    keys.push({ key, identity });
  }

  return keys;
}

/**
 * Split a comma-separated identity list, dropping blanks and duplicates.
 */
export function parseIdentityList(raw: string): readonly string[] {
  const identities = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
  return [...new Set(identities)];
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
