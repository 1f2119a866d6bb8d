/**
 * In-process Alias Store
 *
 * Backs development runs (`STORAGE_DRIVER=memory`) and the test suites.
 * Each write mutates state synchronously inside the write lock, so a
 * reader sees either none or all of it.
 */

import {
  DuplicateError,
  NotFoundError,
  RECENT_MAPPINGS_LIMIT,
  type AggregateStats,
  type DailyStat,
  type UrlMapping,
} from "@snaplink/shared";
import { systemClock, toDateKey, type Clock } from "./dates.js";
import type { AliasStore, StoreOptions } from "./store.js";
import { WriteLock } from "./write-lock.js";

export class MemoryAliasStore implements AliasStore {
  private readonly mappings = new Map<string, UrlMapping>();
  private readonly dailyStats = new Map<string, DailyStat>();
  private readonly lock = new WriteLock();
  private readonly clock: Clock;
  private nextId = 1;

  constructor(options: StoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async exists(code: string): Promise<boolean> {
    return this.mappings.has(code);
  }

  insert(code: string, originalUrl: string): Promise<UrlMapping> {
    return this.lock.run(async () => {
      if (this.mappings.has(code)) {
        throw new DuplicateError(code);
      }

      const mapping: UrlMapping = {
        id: this.nextId++,
        shortCode: code,
        originalUrl,
        clicks: 0,
        createdAt: this.clock(),
      };
      this.mappings.set(code, mapping);

      return { ...mapping };
    });
  }

  async lookup(code: string): Promise<UrlMapping> {
    const mapping = this.mappings.get(code);
    if (!mapping) {
      throw new NotFoundError(code);
    }
    return { ...mapping };
  }

  recordClick(code: string): Promise<void> {
    return this.lock.run(async () => {
      const mapping = this.mappings.get(code);
      if (!mapping) {
        throw new NotFoundError(code);
      }

      mapping.clicks += 1;
      this.today().totalClicks += 1;
    });
  }

  recordCreation(): Promise<void> {
    return this.lock.run(async () => {
      this.today().urlsCreated += 1;
    });
  }

  async aggregateStats(): Promise<AggregateStats> {
    let totalClicks = 0;
    for (const mapping of this.mappings.values()) {
      totalClicks += mapping.clicks;
    }

    const today = this.dailyStats.get(toDateKey(this.clock()));

    return {
      totalUrls: this.mappings.size,
      totalClicks,
      todayUrls: today?.urlsCreated ?? 0,
      todayClicks: today?.totalClicks ?? 0,
    };
  }

  async recentMappings(limit: number = RECENT_MAPPINGS_LIMIT): Promise<UrlMapping[]> {
    // Map iteration order is insertion order, and ids grow with it.
    return Array.from(this.mappings.values())
      .reverse()
      .slice(0, Math.max(0, limit))
      .map((mapping) => ({ ...mapping }));
  }

  clearAll(): Promise<void> {
    return this.lock.run(async () => {
      this.mappings.clear();
      this.dailyStats.clear();
    });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    await this.lock.run(async () => undefined);
  }

  /** Daily stats snapshot, oldest first. */
  async listDailyStats(): Promise<DailyStat[]> {
    return Array.from(this.dailyStats.values())
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((stat) => ({ ...stat }));
  }

  private today(): DailyStat {
    const date = toDateKey(this.clock());
    let stat = this.dailyStats.get(date);
    if (!stat) {
      stat = { date, urlsCreated: 0, totalClicks: 0 };
      this.dailyStats.set(date, stat);
    }
    return stat;
  }
}
