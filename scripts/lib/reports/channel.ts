import { formatDate, formatNumber, renderRow, truncate, type Column } from "../format.js";
import type { ChannelInfo, PlaylistVideo } from "../youtube-api.js";

export function renderChannelInfo(channel: ChannelInfo): string[] {
  const lines = [
    `Channel: ${channel.title}`,
    `ID: ${channel.id}`,
    `Custom URL: ${channel.customUrl ?? "N/A"}`,
    "",
    `Subscribers: ${formatNumber(channel.subscriberCount)}`,
    `Total Views: ${formatNumber(channel.viewCount)}`,
    `Video Count: ${formatNumber(channel.videoCount)}`,
    "",
    `Description: ${truncate(channel.description || "N/A", 200)}...`,
  ];
  if (channel.uploadsPlaylistId) {
    lines.push("", `Uploads Playlist ID: ${channel.uploadsPlaylistId}`);
  }
  return lines;
}

export interface ChannelVideoRow extends PlaylistVideo {
  views: number;
}

const VIDEO_COLUMNS: Column[] = [
  { header: "Title", width: 50 },
  { header: "Views", width: 12, align: "right" },
  { header: "Published", width: 10 },
];

export function renderChannelVideos(videos: ChannelVideoRow[]): string[] {
  const lines = [renderRow(VIDEO_COLUMNS, VIDEO_COLUMNS.map((c) => c.header)), "-".repeat(80)];
  for (const video of videos) {
    lines.push(
      renderRow(VIDEO_COLUMNS, [
        truncate(video.title, 48),
        formatNumber(video.views),
        formatDate(video.publishedAt),
      ])
    );
    lines.push(`  ID: ${video.videoId}`);
  }
  return lines;
}

export function renderChannelSearch(results: PlaylistVideo[], query: string): string[] {
  if (results.length === 0) {
    return [`No videos found matching '${query}'`];
  }
  const lines = [`Search results for '${query}':`, ""];
  for (const result of results) {
    lines.push(
      `• ${result.title}`,
      `  ID: ${result.videoId}`,
      `  Published: ${formatDate(result.publishedAt)}`,
      ""
    );
  }
  return lines;
}
