/**
 * Shared Type Definitions
 */

// =============================================================================
// Domain Types
// =============================================================================

/**
 * Persisted association between a short code and its destination.
 */
export interface UrlMapping {
  /** Monotonically assigned identity */
  id: number;

  /** Short code (random Base62 or custom), unique across the store */
  shortCode: string;

  /** Original destination URL */
  originalUrl: string;

  /** Number of successful redirects */
  clicks: number;

  /** Creation timestamp */
  createdAt: Date;
}

/**
 * Aggregate counters for one calendar date (`YYYY-MM-DD`, process-local).
 */
export interface DailyStat {
  date: string;
  urlsCreated: number;
  totalClicks: number;
}

/**
 * Store-wide totals plus today's counters.
 */
export interface AggregateStats {
  totalUrls: number;
  totalClicks: number;
  todayUrls: number;
  todayClicks: number;
}

// =============================================================================
// API Types (wire format, snake_case)
// =============================================================================

/**
 * POST /api/shorten response body
 */
export interface ShortenResponse {
  short_url: string;
  short_code: string;
  original_url: string;
  success: true;
}

/**
 * GET /api/stats response body
 */
export interface StatsResponse {
  total_urls: number;
  total_clicks: number;
  today_urls: number;
  today_clicks: number;
}

/**
 * One entry of GET /api/stats/daily
 */
export interface DailyStatResponse {
  date: string;
  urls_created: number;
  total_clicks: number;
}

/**
 * One entry of GET /api/recent
 */
export interface RecentLinkResponse {
  short_code: string;
  short_url: string;
  original_url: string;
  clicks: number;
  created_at: string;
}

/**
 * Standard API error response
 */
export interface ApiError {
  success: false;
  error: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// Service Health Types
// =============================================================================

/**
 * GET /health response body
 */
export interface HealthCheckResponse {
  status: "healthy" | "unhealthy";
  timestamp: string;
  database: "connected" | "disconnected";
}
