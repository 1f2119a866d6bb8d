/**
 * snaplink API Service
 *
 * Entry point: loads configuration, opens the store, serves HTTP.
 *
 * Endpoints:
 *   POST   /api/shorten      - Create a short link
 *   GET    /:shortCode       - Redirect to the original URL
 *   GET    /api/stats        - Aggregate statistics
 *   GET    /api/stats/daily  - Per-day statistics
 *   GET    /api/recent       - Recently created links
 *   DELETE /api/clear        - Wipe all data
 *   GET    /health           - Health check
 */

import type { FastifyInstance } from "fastify";
import { logger } from "@snaplink/logger";
import { createAliasStore, type AliasStore } from "@snaplink/db";
import { loadConfig, toStoreConfig, validateConfig } from "./config.js";
import { buildApp } from "./app.js";

let app: FastifyInstance | null = null;
let store: AliasStore | null = null;

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Received shutdown signal");

  try {
    if (app) {
      await app.close();
      logger.info("HTTP server closed");
    }

    if (store) {
      await store.close();
      logger.info("Store closed");
    }

    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  try {
    const config = loadConfig();
    validateConfig(config);

    store = await createAliasStore(toStoreConfig(config));
    app = await buildApp({ config, store });

    await app.listen({ port: config.port, host: config.host });

    logger.info(`snaplink API running on http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  }
}

void start();
