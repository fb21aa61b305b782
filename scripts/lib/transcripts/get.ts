import type { ChannelCatalog, VideoSnippet } from "../youtube-api.js";
import { indexEntryFor, type TranscriptCache } from "./cache.js";
import { joinSegments } from "./fetcher.js";
import type { TranscriptFetcher, TranscriptRecord, UnavailableReason } from "./types.js";

export type OwnershipResult =
  | { kind: "own" }
  | { kind: "external" }
  | { kind: "unknown"; reason: string };

export type MetadataResult =
  | { status: "ok"; snippet: VideoSnippet }
  | { status: "missing" }
  | { status: "failed"; reason: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function lookupMetadata(
  catalog: ChannelCatalog,
  videoId: string
): Promise<MetadataResult> {
  try {
    const snippet = await catalog.getVideoSnippet(videoId);
    return snippet ? { status: "ok", snippet } : { status: "missing" };
  } catch (err) {
    return { status: "failed", reason: errorMessage(err) };
  }
}

/**
 * Compare the video's channel to the authenticated user's channel.
 */
export async function determineOwnership(
  catalog: ChannelCatalog,
  metadata: MetadataResult
): Promise<OwnershipResult> {
  if (metadata.status === "failed") {
    return { kind: "unknown", reason: `video lookup failed: ${metadata.reason}` };
  }
  if (metadata.status === "missing") {
    return { kind: "unknown", reason: "video metadata not found" };
  }
  try {
    const mine = await catalog.getMyChannel();
    if (!mine) {
      return { kind: "external" };
    }
    return metadata.snippet.channelId === mine.id ? { kind: "own" } : { kind: "external" };
  } catch (err) {
    return { kind: "unknown", reason: `channel lookup failed: ${errorMessage(err)}` };
  }
}

export type GetTranscriptResult =
  | { status: "cached"; record: TranscriptRecord }
  | { status: "fetched"; record: TranscriptRecord; ownership: OwnershipResult }
  | { status: "unavailable"; reason: UnavailableReason; message: string };

export interface GetTranscriptOptions {
  cache: TranscriptCache;
  fetcher: TranscriptFetcher;
  catalog: ChannelCatalog;
}

/**
 * Cached record when there is one; otherwise fetch the captions, look up
 * title and ownership, and cache the result for later searches.
 */
export async function getTranscript(
  videoId: string,
  options: GetTranscriptOptions
): Promise<GetTranscriptResult> {
  const { cache, fetcher, catalog } = options;

  const cached = await cache.read(videoId);
  if (cached) {
    return { status: "cached", record: cached };
  }

  const result = await fetcher.fetch(videoId);
  if (result.status === "unavailable") {
    return result;
  }

  const metadata = await lookupMetadata(catalog, videoId);
  const ownership = await determineOwnership(catalog, metadata);
  const snippet = metadata.status === "ok" ? metadata.snippet : undefined;

  const record: TranscriptRecord = {
    video_id: videoId,
    title: snippet?.title || videoId,
    published_at: snippet?.publishedAt || "",
    channel_name: snippet?.channelTitle || "Unknown",
    is_own_video: ownership.kind === "own",
    ownership: ownership.kind,
    language: result.language,
    segments: result.segments,
    full_text: joinSegments(result.segments),
  };

  await cache.write(record);
  const index = await cache.loadIndex();
  index.videos[videoId] = indexEntryFor(record);
  await cache.saveIndex(index);

  return { status: "fetched", record, ownership };
}
