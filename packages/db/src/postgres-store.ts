/**
 * PostgreSQL Alias Store
 *
 * Raw SQL over a `pg` pool.
 *
 * Consistency model:
 * - Uniqueness: `urls.short_code` UNIQUE constraint; violation (23505)
 *   surfaces as DuplicateError.
 * - recordClick: mapping increment and daily upsert in one transaction.
 * - recordCreation: single-statement upsert on `daily_stats.date`.
 * - clearAll: both DELETEs in one transaction.
 * - aggregateStats: one statement, so one snapshot.
 * - Writes additionally go through the instance WriteLock, so writers from
 *   this process never contend inside PostgreSQL.
 */

import type { Pool, PoolClient } from "pg";
import {
  DuplicateError,
  NotFoundError,
  RECENT_MAPPINGS_LIMIT,
  SnaplinkError,
  StorageError,
  type AggregateStats,
  type DailyStat,
  type UrlMapping,
} from "@snaplink/shared";
import { createLogger } from "@snaplink/logger";
import { systemClock, toDateKey, type Clock } from "./dates.js";
import type { AliasStore, StoreOptions } from "./store.js";
import {
  rowToDailyStat,
  rowToMapping,
  type AggregateStatsRow,
  type DailyStatRow,
  type UrlRow,
} from "./types.js";
import { WriteLock } from "./write-lock.js";

const log = createLogger("db");

/** PostgreSQL SQLSTATE for unique_violation */
const UNIQUE_VIOLATION = "23505";

// =============================================================================
// SQL Queries
// =============================================================================

const MAPPING_COLUMNS = "id, short_code, original_url, clicks, created_at";

export const SQL = {
  EXISTS: `SELECT 1 FROM urls WHERE short_code = $1 LIMIT 1`,

  INSERT: `
    INSERT INTO urls (short_code, original_url)
    VALUES ($1, $2)
    RETURNING ${MAPPING_COLUMNS}
  `,

  LOOKUP: `SELECT ${MAPPING_COLUMNS} FROM urls WHERE short_code = $1`,

  INCREMENT_CLICKS: `UPDATE urls SET clicks = clicks + 1 WHERE short_code = $1`,

  UPSERT_DAILY_CLICK: `
    INSERT INTO daily_stats (date, urls_created, total_clicks)
    VALUES ($1, 0, 1)
    ON CONFLICT (date) DO UPDATE SET total_clicks = daily_stats.total_clicks + 1
  `,

  UPSERT_DAILY_CREATION: `
    INSERT INTO daily_stats (date, urls_created, total_clicks)
    VALUES ($1, 1, 0)
    ON CONFLICT (date) DO UPDATE SET urls_created = daily_stats.urls_created + 1
  `,

  AGGREGATE_STATS: `
    SELECT
      (SELECT COUNT(*) FROM urls) AS total_urls,
      (SELECT COALESCE(SUM(clicks), 0) FROM urls) AS total_clicks,
      (SELECT urls_created FROM daily_stats WHERE date = $1) AS today_urls,
      (SELECT total_clicks FROM daily_stats WHERE date = $1) AS today_clicks
  `,

  DAILY_STATS: `SELECT date, urls_created, total_clicks FROM daily_stats ORDER BY date ASC`,

  RECENT: `
    SELECT ${MAPPING_COLUMNS}
    FROM urls
    ORDER BY created_at DESC, id DESC
    LIMIT $1
  `,

  DELETE_URLS: `DELETE FROM urls`,

  DELETE_DAILY_STATS: `DELETE FROM daily_stats`,

  HEALTH: `SELECT 1`,
} as const;

// =============================================================================
// Helpers
// =============================================================================

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

/**
 * Domain errors pass through; anything else from the driver is wrapped.
 */
function toStorageError(operation: string, err: unknown): SnaplinkError {
  if (err instanceof SnaplinkError) {
    return err;
  }
  log.error({ err, operation }, "Database operation failed");
  return new StorageError(operation, err);
}

// =============================================================================
// Store
// =============================================================================

export class PostgresAliasStore implements AliasStore {
  private readonly lock = new WriteLock();
  private readonly clock: Clock;

  constructor(
    private readonly pool: Pool,
    options: StoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async exists(code: string): Promise<boolean> {
    try {
      const result = await this.pool.query(SQL.EXISTS, [code]);
      return result.rows.length > 0;
    } catch (err) {
      throw toStorageError("exists", err);
    }
  }

  insert(code: string, originalUrl: string): Promise<UrlMapping> {
    return this.lock.run(async () => {
      try {
        const result = await this.pool.query<UrlRow>(SQL.INSERT, [code, originalUrl]);
        return rowToMapping(result.rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new DuplicateError(code, { cause: err });
        }
        throw toStorageError("insert", err);
      }
    });
  }

  async lookup(code: string): Promise<UrlMapping> {
    let rows: UrlRow[];
    try {
      ({ rows } = await this.pool.query<UrlRow>(SQL.LOOKUP, [code]));
    } catch (err) {
      throw toStorageError("lookup", err);
    }

    if (rows.length === 0) {
      throw new NotFoundError(code);
    }
    return rowToMapping(rows[0]);
  }

  recordClick(code: string): Promise<void> {
    const today = toDateKey(this.clock());

    return this.lock.run(() =>
      this.transaction("recordClick", async (client) => {
        const updated = await client.query(SQL.INCREMENT_CLICKS, [code]);
        if (updated.rowCount === 0) {
          throw new NotFoundError(code);
        }
        await client.query(SQL.UPSERT_DAILY_CLICK, [today]);
      })
    );
  }

  recordCreation(): Promise<void> {
    const today = toDateKey(this.clock());

    return this.lock.run(async () => {
      try {
        await this.pool.query(SQL.UPSERT_DAILY_CREATION, [today]);
      } catch (err) {
        throw toStorageError("recordCreation", err);
      }
    });
  }

  async aggregateStats(): Promise<AggregateStats> {
    try {
      const { rows } = await this.pool.query<AggregateStatsRow>(SQL.AGGREGATE_STATS, [
        toDateKey(this.clock()),
      ]);
      const row = rows[0];

      return {
        totalUrls: Number(row.total_urls),
        totalClicks: Number(row.total_clicks),
        todayUrls: row.today_urls ?? 0,
        todayClicks: row.today_clicks ?? 0,
      };
    } catch (err) {
      throw toStorageError("aggregateStats", err);
    }
  }

  async listDailyStats(): Promise<DailyStat[]> {
    try {
      const { rows } = await this.pool.query<DailyStatRow>(SQL.DAILY_STATS);
      return rows.map(rowToDailyStat);
    } catch (err) {
      throw toStorageError("listDailyStats", err);
    }
  }

  async recentMappings(limit: number = RECENT_MAPPINGS_LIMIT): Promise<UrlMapping[]> {
    try {
      const { rows } = await this.pool.query<UrlRow>(SQL.RECENT, [Math.max(0, limit)]);
      return rows.map(rowToMapping);
    } catch (err) {
      throw toStorageError("recentMappings", err);
    }
  }

  clearAll(): Promise<void> {
    return this.lock.run(() =>
      this.transaction("clearAll", async (client) => {
        await client.query(SQL.DELETE_URLS);
        await client.query(SQL.DELETE_DAILY_STATS);
      })
    );
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query(SQL.HEALTH);
      return true;
    } catch (err) {
      log.warn({ err }, "Database ping failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.lock.run(() => this.pool.end());
  }

  /**
   * Run `fn` inside BEGIN/COMMIT on a dedicated client.
   * Any error rolls back and is rethrown as a domain or storage error;
   * a failed ROLLBACK never replaces the original error.
   */
  private async transaction<T>(
    operation: string,
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw toStorageError(operation, err);
    }

    // A client whose ROLLBACK failed may still hold an open transaction;
    // release(true) makes pg destroy it instead of pooling it.
    let discard = false;
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        discard = true;
        log.error({ err: rollbackErr, operation }, "Rollback failed, discarding connection");
      }
      throw toStorageError(operation, err);
    } finally {
      client.release(discard);
    }
  }
}
