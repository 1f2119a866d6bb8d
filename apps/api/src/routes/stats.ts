/**
 * Statistics and Administration Routes
 *
 * Endpoints:
 *   GET    /api/stats        - Totals and today's counters
 *   GET    /api/stats/daily  - Every daily stat row, oldest first
 *   GET    /api/recent       - Ten newest links
 *   DELETE /api/clear        - Wipe links and statistics
 */

import type { FastifyInstance } from "fastify";
import type { DailyStatResponse, RecentLinkResponse, StatsResponse } from "@snaplink/shared";
import type { LinkService } from "../services/index.js";
import { buildShortUrl } from "./short-url.js";

export interface StatsRoutesOptions {
  links: LinkService;
  baseUrl: string | null;
}

export async function statsRoutes(fastify: FastifyInstance, options: StatsRoutesOptions): Promise<void> {
  const { links, baseUrl } = options;

  fastify.get("/api/stats", async (): Promise<StatsResponse> => {
    const stats = await links.stats();
    return {
      total_urls: stats.totalUrls,
      total_clicks: stats.totalClicks,
      today_urls: stats.todayUrls,
      today_clicks: stats.todayClicks,
    };
  });

  fastify.get("/api/stats/daily", async (): Promise<DailyStatResponse[]> => {
    const daily = await links.dailyStats();
    return daily.map((stat) => ({
      date: stat.date,
      urls_created: stat.urlsCreated,
      total_clicks: stat.totalClicks,
    }));
  });

  fastify.get("/api/recent", async (request): Promise<RecentLinkResponse[]> => {
    const recent = await links.recent();
    return recent.map((mapping) => ({
      short_code: mapping.shortCode,
      short_url: buildShortUrl(request, baseUrl, mapping.shortCode),
      original_url: mapping.originalUrl,
      clicks: mapping.clicks,
      created_at: mapping.createdAt.toISOString(),
    }));
  });

  fastify.delete("/api/clear", async () => {
    await links.clearAll();
    return { message: "All data cleared successfully" };
  });
}
