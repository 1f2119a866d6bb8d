/**
 * Link Service
 *
 * What the routes call: shortening, redirect resolution, statistics and
 * the clear-all administrative operation.
 */

import {
  InvalidCodeFormatError,
  RECENT_MAPPINGS_LIMIT,
  isValidShortCode,
  type AggregateStats,
  type DailyStat,
  type UrlMapping,
} from "@snaplink/shared";
import type { AliasStore } from "@snaplink/db";
import { createLogger } from "@snaplink/logger";
import type { AliasAllocator } from "./allocator.js";

const log = createLogger("links");

export class LinkService {
  constructor(
    private readonly store: AliasStore,
    private readonly allocator: AliasAllocator
  ) {}

  shorten(originalUrl: string, customCode?: string | null): Promise<UrlMapping> {
    return this.allocator.allocate(originalUrl, customCode);
  }

  /**
   * Resolve a visitor's short code to its destination, counting the click.
   *
   * A mapping removed between lookup and click (clear-all) resolves as
   * not found.
   *
   * @throws InvalidCodeFormatError code could never have been stored
   * @throws NotFoundError
   */
  async resolve(code: string): Promise<string> {
    if (!isValidShortCode(code)) {
      throw new InvalidCodeFormatError("Invalid short code format");
    }

    const mapping = await this.store.lookup(code);
    await this.store.recordClick(code);

    log.debug({ shortCode: code }, "Redirect resolved");
    return mapping.originalUrl;
  }

  stats(): Promise<AggregateStats> {
    return this.store.aggregateStats();
  }

  dailyStats(): Promise<DailyStat[]> {
    return this.store.listDailyStats();
  }

  recent(limit: number = RECENT_MAPPINGS_LIMIT): Promise<UrlMapping[]> {
    return this.store.recentMappings(limit);
  }

  async clearAll(): Promise<void> {
    await this.store.clearAll();
    log.warn("All links and daily statistics cleared");
  }

  isHealthy(): Promise<boolean> {
    return this.store.ping();
  }
}
