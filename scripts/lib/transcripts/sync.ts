import { collectPages, type ChannelCatalog, type PlaylistVideo } from "../youtube-api.js";
import { indexEntryFor, type TranscriptCache } from "./cache.js";
import { joinSegments } from "./fetcher.js";
import type { TranscriptFetchResult, TranscriptFetcher, TranscriptRecord } from "./types.js";

export interface SyncProgress {
  position: number;
  total: number;
  video: PlaylistVideo;
  result: TranscriptFetchResult;
}

export interface SyncOptions {
  catalog: ChannelCatalog;
  fetcher: TranscriptFetcher;
  cache: TranscriptCache;
  force?: boolean;
  onEnumerated?: (channelTitle: string, total: number) => void;
  onProgress?: (progress: SyncProgress) => void;
}

export interface SyncSummary {
  channelTitle: string;
  total: number;
  synced: number;
  skipped: number;
  failed: number;
}

/**
 * Mirror captions for every upload on the authenticated channel.
 *
 * Videos with a cached file are skipped unless `force` is set. A video
 * without captions is recorded in the index as `has_transcript: false` and
 * the batch moves on. The index is written after every fetched video, so an
 * interrupted run keeps what it already recorded.
 *
 * @returns null when the account has no channel
 */
export async function syncChannel(options: SyncOptions): Promise<SyncSummary | null> {
  const { catalog, fetcher, cache, force = false, onEnumerated, onProgress } = options;

  const channel = await catalog.getMyChannel();
  if (!channel) {
    return null;
  }
  if (!channel.uploadsPlaylistId) {
    throw new Error(`Channel ${channel.id} has no uploads playlist`);
  }

  const playlistId = channel.uploadsPlaylistId;
  const videos = await collectPages((pageToken, maxResults) =>
    catalog.listPlaylistPage(playlistId, pageToken, maxResults)
  );
  onEnumerated?.(channel.title, videos.length);

  await cache.ensureDir();
  const index = await cache.loadIndex();
  const summary: SyncSummary = {
    channelTitle: channel.title,
    total: videos.length,
    synced: 0,
    skipped: 0,
    failed: 0,
  };

  for (const [i, video] of videos.entries()) {
    if (!force && (await cache.has(video.videoId))) {
      summary.skipped++;
      continue;
    }

    const result = await fetcher.fetch(video.videoId);

    if (result.status === "ok") {
      const record: TranscriptRecord = {
        video_id: video.videoId,
        title: video.title,
        published_at: video.publishedAt,
        channel_name: channel.title,
        is_own_video: true,
        ownership: "own",
        language: result.language,
        segments: result.segments,
        full_text: joinSegments(result.segments),
      };
      await cache.write(record);
      index.videos[video.videoId] = indexEntryFor(record);
      summary.synced++;
    } else {
      index.videos[video.videoId] = {
        title: video.title,
        published_at: video.publishedAt,
        has_transcript: false,
        is_own_video: true,
        ownership: "own",
      };
      summary.failed++;
    }

    await cache.saveIndex(index);
    onProgress?.({ position: i + 1, total: videos.length, video, result });
  }

  await cache.saveIndex(index);
  return summary;
}
