import { google, youtubeAnalytics_v2 } from "googleapis";
import type { OAuth2Client } from "google-auth-library";
import { loadToken } from "./auth.js";

// ============================================================================
// Analytics Client
// ============================================================================

export async function getAnalyticsClient(
  auth?: OAuth2Client
): Promise<youtubeAnalytics_v2.Youtubeanalytics> {
  return google.youtubeAnalytics({ version: "v2", auth: auth ?? (await loadToken()) });
}

export interface DateRange {
  startDate: string;
  endDate: string;
  days: number;
}

function isoDay(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Analytics lag a day or two behind, so the window ends yesterday.
 */
export function getDateRange(days: number, now: Date = new Date()): DateRange {
  const end = new Date(now);
  end.setDate(end.getDate() - 1);
  const start = new Date(end);
  start.setDate(start.getDate() - days);
  return { startDate: isoDay(start), endDate: isoDay(end), days };
}

// ============================================================================
// Report queries
// ============================================================================

export type ReportCell = string | number;
export type ReportRow = ReportCell[];

export interface ReportParams {
  metrics: string[];
  dimensions?: string[];
  filters?: string;
  sort?: string;
  maxResults?: number;
}

export type ReportQuery = (
  channelId: string,
  range: DateRange,
  params: ReportParams
) => Promise<ReportRow[]>;

function toCell(value: unknown): ReportCell {
  return typeof value === "number" ? value : String(value ?? "");
}

export function createReportQuery(
  analytics: youtubeAnalytics_v2.Youtubeanalytics
): ReportQuery {
  return async (channelId, range, params) => {
    const res = await analytics.reports.query({
      ids: `channel==${channelId}`,
      startDate: range.startDate,
      endDate: range.endDate,
      metrics: params.metrics.join(","),
      dimensions: params.dimensions?.join(","),
      filters: params.filters,
      sort: params.sort,
      maxResults: params.maxResults,
    });
    const rows: unknown[][] = res.data.rows || [];
    return rows.map((row) => row.map(toCell));
  };
}

function num(row: ReportRow, index: number): number {
  const value = row[index];
  if (typeof value === "number") return value;
  const parsed = parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : 0;
}

function str(row: ReportRow, index: number): string {
  return String(row[index] ?? "");
}

// ============================================================================
// Channel overview
// ============================================================================

export interface ChannelOverview {
  views: number;
  watchMinutes: number;
  subscribersGained: number;
  subscribersLost: number;
  likes: number;
  comments: number;
  shares: number;
  revenue: number;
}

export async function getOverview(
  query: ReportQuery,
  channelId: string,
  range: DateRange
): Promise<ChannelOverview | null> {
  const rows = await query(channelId, range, {
    metrics: [
      "views",
      "estimatedMinutesWatched",
      "subscribersGained",
      "subscribersLost",
      "likes",
      "comments",
      "shares",
      "estimatedRevenue",
    ],
  });
  const row = rows[0];
  if (!row) return null;
  return {
    views: num(row, 0),
    watchMinutes: num(row, 1),
    subscribersGained: num(row, 2),
    subscribersLost: num(row, 3),
    likes: num(row, 4),
    comments: num(row, 5),
    shares: num(row, 6),
    revenue: num(row, 7),
  };
}

// ============================================================================
// Top videos
// ============================================================================

export interface VideoPerformance {
  videoId: string;
  views: number;
  watchMinutes: number;
  revenue: number;
}

export async function getTopVideos(
  query: ReportQuery,
  channelId: string,
  range: DateRange,
  maxResults: number
): Promise<VideoPerformance[]> {
  const rows = await query(channelId, range, {
    metrics: ["views", "estimatedMinutesWatched", "estimatedRevenue"],
    dimensions: ["video"],
    sort: "-views",
    maxResults,
  });
  return rows.map((row) => ({
    videoId: str(row, 0),
    views: num(row, 1),
    watchMinutes: num(row, 2),
    revenue: num(row, 3),
  }));
}

// ============================================================================
// Single video
// ============================================================================

export interface VideoStats {
  views: number;
  watchMinutes: number;
  averageViewDuration: number;
  subscribersGained: number;
  likes: number;
  comments: number;
  shares: number;
  revenue: number;
}

export async function getVideoStats(
  query: ReportQuery,
  channelId: string,
  range: DateRange,
  videoId: string
): Promise<VideoStats | null> {
  const rows = await query(channelId, range, {
    metrics: [
      "views",
      "estimatedMinutesWatched",
      "averageViewDuration",
      "subscribersGained",
      "likes",
      "comments",
      "shares",
      "estimatedRevenue",
    ],
    filters: `video==${videoId}`,
  });
  const row = rows[0];
  if (!row) return null;
  return {
    views: num(row, 0),
    watchMinutes: num(row, 1),
    averageViewDuration: num(row, 2),
    subscribersGained: num(row, 3),
    likes: num(row, 4),
    comments: num(row, 5),
    shares: num(row, 6),
    revenue: num(row, 7),
  };
}

// ============================================================================
// Audience breakdowns
// ============================================================================

export interface DemographicShare {
  ageGroup: string;
  gender: string;
  percentage: number;
}

export async function getDemographics(
  query: ReportQuery,
  channelId: string,
  range: DateRange
): Promise<DemographicShare[]> {
  const rows = await query(channelId, range, {
    metrics: ["viewerPercentage"],
    dimensions: ["ageGroup", "gender"],
  });
  return rows.map((row) => ({
    ageGroup: str(row, 0),
    gender: str(row, 1),
    percentage: num(row, 2),
  }));
}

export interface TrafficSource {
  source: string;
  views: number;
}

export async function getTrafficSources(
  query: ReportQuery,
  channelId: string,
  range: DateRange
): Promise<TrafficSource[]> {
  const rows = await query(channelId, range, {
    metrics: ["views"],
    dimensions: ["insightTrafficSourceType"],
    sort: "-views",
  });
  return rows.map((row) => ({ source: str(row, 0), views: num(row, 1) }));
}

export interface CountryViews {
  country: string;
  views: number;
  watchMinutes: number;
}

export async function getGeography(
  query: ReportQuery,
  channelId: string,
  range: DateRange,
  maxResults = 20
): Promise<CountryViews[]> {
  const rows = await query(channelId, range, {
    metrics: ["views", "estimatedMinutesWatched"],
    dimensions: ["country"],
    sort: "-views",
    maxResults,
  });
  return rows.map((row) => ({
    country: str(row, 0),
    views: num(row, 1),
    watchMinutes: num(row, 2),
  }));
}
