/**
 * @snaplink/logger - Structured Logging Package
 *
 * One pino root per process; each component logs through a child that
 * tags its lines with `component`, so every workspace shares a single
 * destination (and, in development, a single pino-pretty transport).
 *
 * Usage:
 * ```ts
 * import { createLogger } from "@snaplink/logger";
 *
 * const log = createLogger("allocator");
 * log.info({ shortCode: "abc123", isCustom: false }, "Link created");
 * log.error({ err, operation: "insert" }, "Database operation failed");
 * ```
 *
 * Environment: LOG_LEVEL (default info, `silent` allowed), NODE_ENV,
 * SERVICE_NAME (default snaplink).
 */

import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Narrow an arbitrary string (usually an env var) to a pino level.
 */
export function parseLogLevel(value: string, fallback: LogLevel = "info"): LogLevel {
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

// ============================================================================
// Root Logger
// ============================================================================

const NODE_ENV = process.env.NODE_ENV || "development";
const SERVICE_NAME = process.env.SERVICE_NAME || "snaplink";

export const logger: pino.Logger = pino({
  name: SERVICE_NAME,
  level: parseLogLevel(process.env.LOG_LEVEL || "info"),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
  transport:
    NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  base: {
    service: SERVICE_NAME,
    env: NODE_ENV,
  },
});

/**
 * Logger for one component (`db`, `allocator`, `config`, ...).
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export type { Logger } from "pino";
