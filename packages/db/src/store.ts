/**
 * Alias Store Contract
 *
 * Sole authority on short-code uniqueness and on the click/creation
 * counters. Implementations:
 * - PostgresAliasStore: `pg` pool, production
 * - MemoryAliasStore: process memory, development and tests
 *
 * Guarantees every implementation must give:
 * - All writes on one instance are linearized (WriteLock).
 * - `insert` enforces uniqueness itself; `exists` is only an optimization.
 * - Multi-row writes (`recordClick`, `clearAll`) are all-or-nothing for
 *   any concurrent reader.
 * - Driver failures surface as `StorageError`.
 */

import type { AggregateStats, DailyStat, UrlMapping } from "@snaplink/shared";
import type { Clock } from "./dates.js";

export interface AliasStore {
  /** True iff a mapping with this code currently exists. */
  exists(code: string): Promise<boolean>;

  /**
   * Create a mapping with zero clicks.
   * @throws DuplicateError when the code is already taken
   */
  insert(code: string, originalUrl: string): Promise<UrlMapping>;

  /**
   * @throws NotFoundError
   */
  lookup(code: string): Promise<UrlMapping>;

  /**
   * Add one click to the mapping and to today's daily stat, atomically.
   * @throws NotFoundError
   */
  recordClick(code: string): Promise<void>;

  /** Add one to today's `urlsCreated`, creating the row on first use. */
  recordCreation(): Promise<void>;

  aggregateStats(): Promise<AggregateStats>;

  /** Every daily stat row, oldest first. */
  listDailyStats(): Promise<DailyStat[]>;

  /** Newest first. */
  recentMappings(limit?: number): Promise<UrlMapping[]>;

  /** Delete every mapping and every daily stat as one operation. */
  clearAll(): Promise<void>;

  /** Trivial round trip for health checks. */
  ping(): Promise<boolean>;

  /** Release connections. The store is unusable afterwards. */
  close(): Promise<void>;
}

export interface StoreOptions {
  /** Source of the current date for daily stats and `createdAt` */
  clock?: Clock;
}
