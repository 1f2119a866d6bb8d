/**
 * Database Row Types
 *
 * Raw shapes returned by `pg` for the two tables, and their conversion to
 * domain types. BIGINT and aggregate columns arrive as strings.
 */

import type { DailyStat, UrlMapping } from "@snaplink/shared";

export type UrlRow = {
  id: string;
  short_code: string;
  original_url: string;
  clicks: number;
  created_at: Date;
};

export type DailyStatRow = {
  date: string;
  urls_created: number;
  total_clicks: number;
};

export type AggregateStatsRow = {
  total_urls: string;
  total_clicks: string;
  today_urls: number | null;
  today_clicks: number | null;
};

export function rowToMapping(row: UrlRow): UrlMapping {
  return {
    id: Number(row.id),
    shortCode: row.short_code,
    originalUrl: row.original_url,
    clicks: row.clicks,
    createdAt: row.created_at,
  };
}

export function rowToDailyStat(row: DailyStatRow): DailyStat {
  return {
    date: row.date,
    urlsCreated: row.urls_created,
    totalClicks: row.total_clicks,
  };
}
