/**
 * Store Factory
 *
 * Builds the backend selected by configuration.
 */

import { createLogger } from "@snaplink/logger";
import { createPool } from "./client.js";
import type { Clock } from "./dates.js";
import { MemoryAliasStore } from "./memory-store.js";
import { PostgresAliasStore } from "./postgres-store.js";
import { initSchema } from "./schema.js";
import type { AliasStore } from "./store.js";

const log = createLogger("db");

export type StoreDriver = "postgres" | "memory";

export type StoreConfig =
  | { driver: "memory"; clock?: Clock }
  | { driver: "postgres"; databaseUrl: string; poolMax?: number; clock?: Clock };

/**
 * Create the configured store. For PostgreSQL the schema is bootstrapped
 * before the store is returned, so a bad connection fails startup.
 */
export async function createAliasStore(config: StoreConfig): Promise<AliasStore> {
  if (config.driver === "memory") {
    log.warn("Using in-memory store; data is lost on restart");
    return new MemoryAliasStore({ clock: config.clock });
  }

  const pool = createPool({ databaseUrl: config.databaseUrl, max: config.poolMax });
  try {
    await initSchema(pool);
  } catch (err) {
    await pool.end();
    throw err;
  }

  log.info({ poolMax: config.poolMax ?? 10 }, "PostgreSQL store ready");
  return new PostgresAliasStore(pool, { clock: config.clock });
}
