/**
 * Database initialization script
 *
 * Creates the required tables in the database named by DATABASE_URL.
 *
 *   DATABASE_URL=postgresql://... npm run db:init
 */

import { createLogger } from "@snaplink/logger";
import { createPool } from "./client.js";
import { initSchema } from "./schema.js";

const log = createLogger("db-init");

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("Missing required environment variable: DATABASE_URL");
  }

  const pool = createPool({ databaseUrl, max: 1 });
  try {
    await initSchema(pool);
  } finally {
    await pool.end();
  }
}

main().then(
  () => {
    log.info("Database initialization completed");
  },
  (err: unknown) => {
    log.error({ err }, "Database initialization failed");
    process.exitCode = 1;
  }
);
