/**
 * @basketwrap/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";

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

  // Wrapper deployment
  WRAPPER_NAME: z.string().min(1).default("Multi-Asset Wrapper"),
  WRAPPER_SYMBOL: z.string().min(1).max(16).default("MAW"),
  OWNER_ADDRESS: z.string().min(1).default("0xowner"),
  CUSTODY_ADDRESS: z.string().min(1).default("0xwrapper"),
  SLIPPAGE_TOLERANCE_BPS: z.coerce.number().int().min(0).max(10_000).default(100),
  RECOVERY_SCOPE: z.enum(["unrestricted", "non-basket"]).default("unrestricted"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly address: string;
}

function isRole(value: string): value is Role {
  return value === "admin" || value === "user";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:address1,key2:role2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, address] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin or user`);
    }
    if (address === "") {
      throw new Error("Address cannot be empty in API_KEYS");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }

    seen.add(key);
    keys.push({ key, role, address });
  }

  return keys;
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
