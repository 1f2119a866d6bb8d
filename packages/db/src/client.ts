/**
 * PostgreSQL Connection Pool
 *
 * Raw `pg` pool, no ORM. One pool per store instance.
 *
 * Environment (read by the API config, passed in here):
 * - DATABASE_URL: connection string
 * - DATABASE_POOL_MAX: maximum connections
 */

import { Pool } from "pg";
import { createLogger } from "@snaplink/logger";

const log = createLogger("db");

export interface PoolConfig {
  /** PostgreSQL connection URL */
  databaseUrl: string;
  /** Maximum connections in pool */
  max?: number;
  /** Close idle connections after this many ms */
  idleTimeoutMs?: number;
  /** Connection acquisition timeout (ms) */
  connectTimeoutMs?: number;
}

/**
 * Create a connection pool. Connections are opened lazily.
 */
export function createPool(config: PoolConfig): Pool {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: config.max ?? 10,
    idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
    connectionTimeoutMillis: config.connectTimeoutMs ?? 5000,
  });

  // An unhandled 'error' from an idle client terminates the process.
  pool.on("error", (err) => {
    log.error({ err }, "Idle database client error");
  });

  return pool;
}
