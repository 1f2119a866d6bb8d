/**
 * Schema Bootstrap
 *
 * Idempotent DDL for the two tables. Run at service startup and by the
 * `db:init` script.
 */

import type { Pool } from "pg";
import { createLogger } from "@snaplink/logger";

const log = createLogger("db");

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS urls (
    id BIGSERIAL PRIMARY KEY,
    short_code VARCHAR(20) NOT NULL UNIQUE,
    original_url TEXT NOT NULL,
    clicks INTEGER NOT NULL DEFAULT 0 CHECK (clicks >= 0),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS urls_created_at_idx ON urls (created_at DESC, id DESC)`,
  `CREATE TABLE IF NOT EXISTS daily_stats (
    date TEXT PRIMARY KEY,
    urls_created INTEGER NOT NULL DEFAULT 0 CHECK (urls_created >= 0),
    total_clicks INTEGER NOT NULL DEFAULT 0 CHECK (total_clicks >= 0)
  )`,
];

/**
 * Create tables and indexes if they do not exist yet.
 */
export async function initSchema(pool: Pool): Promise<void> {
  const client = await pool.connect();
  let discard = false;
  try {
    await client.query("BEGIN");
    for (const statement of SCHEMA_STATEMENTS) {
      await client.query(statement);
    }
    await client.query("COMMIT");
    log.info({ tables: ["urls", "daily_stats"] }, "Database schema ready");
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      discard = true;
      log.error({ err: rollbackErr }, "Schema rollback failed, discarding connection");
    }
    log.error({ err }, "Database schema initialization failed");
    throw err;
  } finally {
    client.release(discard);
  }
}
