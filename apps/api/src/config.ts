/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * Plain parsing with defaults; fails fast on startup if a required
 * variable is missing.
 */

import { createLogger, parseLogLevel, type LogLevel } from "@snaplink/logger";
import type { StoreConfig, StoreDriver } from "@snaplink/db";
import { SHORTCODE_CONFIG } from "@snaplink/shared";

const log = createLogger("config");

export interface Config {
  // Server
  port: number;
  host: string;
  /** Public prefix for short URLs; request protocol and host when unset */
  baseUrl: string | null;
  /** Allowed CORS origin; `true` reflects any origin */
  corsOrigin: string | true;

  // Storage
  storageDriver: StoreDriver;
  databaseUrl: string | null;
  databasePoolMax: number;

  // Allocation
  allocationMaxAttempts: number;

  // Logging
  logLevel: LogLevel;
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStorageDriver(value: string): StoreDriver {
  const normalized = value.trim().toLowerCase();
  if (normalized === "postgres" || normalized === "memory") {
    return normalized;
  }
  throw new Error(`Unknown STORAGE_DRIVER "${value}" (expected "postgres" or "memory")`);
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 *
 * @throws Error if required variables are missing or malformed
 */
export function loadConfig(env: Env = process.env): Config {
  const storageDriver = parseStorageDriver(optional(env, "STORAGE_DRIVER", "postgres"));
  const baseUrl = env.BASE_URL?.trim().replace(/\/+$/, "");

  return {
    // Server
    port: optionalInt(env, "PORT", 5000),
    host: optional(env, "HOST", "0.0.0.0"),
    baseUrl: baseUrl || null,
    corsOrigin: env.CORS_ORIGIN || true,

    // Storage
    storageDriver,
    databaseUrl: storageDriver === "postgres" ? required(env, "DATABASE_URL") : env.DATABASE_URL || null,
    databasePoolMax: optionalInt(env, "DATABASE_POOL_MAX", 10),

    // Allocation
    allocationMaxAttempts: optionalInt(env, "ALLOCATION_MAX_ATTEMPTS", SHORTCODE_CONFIG.MAX_ATTEMPTS),

    // Logging
    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
    nodeEnv: optional(env, "NODE_ENV", "development"),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings; returns them for callers that
 * want to surface them elsewhere.
 */
export function validateConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (config.allocationMaxAttempts < 1) {
    warnings.push(
      `ALLOCATION_MAX_ATTEMPTS=${config.allocationMaxAttempts} leaves no attempts; every random allocation will fail.`
    );
  }

  if (config.storageDriver === "memory" && config.nodeEnv === "production") {
    warnings.push("STORAGE_DRIVER=memory in production; all links are lost on restart.");
  }

  if (!config.baseUrl && config.nodeEnv === "production") {
    warnings.push("BASE_URL is not set; short URLs are built from the request Host header.");
  }

  if (config.databasePoolMax < 1) {
    warnings.push(`DATABASE_POOL_MAX=${config.databasePoolMax} is below 1.`);
  }

  for (const warning of warnings) {
    log.warn(`[config] ${warning}`);
  }

  return warnings;
}

/**
 * Store settings for `createAliasStore`.
 */
export function toStoreConfig(config: Config): StoreConfig {
  if (config.storageDriver === "memory") {
    return { driver: "memory" };
  }
  if (!config.databaseUrl) {
    throw new Error("Missing required environment variable: DATABASE_URL");
  }
  return { driver: "postgres", databaseUrl: config.databaseUrl, poolMax: config.databasePoolMax };
}
