import { google, youtube_v3 } from "googleapis";
import type { OAuth2Client } from "google-auth-library";
import { loadToken } from "./auth.js";

// ============================================================================
// YouTube Client
// ============================================================================

export async function getYouTubeClient(auth?: OAuth2Client): Promise<youtube_v3.Youtube> {
  return google.youtube({ version: "v3", auth: auth ?? (await loadToken()) });
}

// Data API maximum page size for list calls
export const PAGE_SIZE = 50;

function toCount(value: string | null | undefined): number {
  return value ? parseInt(value, 10) : 0;
}

// ============================================================================
// Channels
// ============================================================================

export interface ChannelInfo {
  id: string;
  title: string;
  description: string;
  customUrl?: string;
  subscriberCount: number;
  videoCount: number;
  viewCount: number;
  uploadsPlaylistId?: string;
}

/**
 * The authenticated user's channel, or null when the account has none.
 */
export async function getMyChannel(
  youtube: youtube_v3.Youtube
): Promise<ChannelInfo | null> {
  const res = await youtube.channels.list({
    part: ["snippet", "statistics", "contentDetails"],
    mine: true,
  });

  const c = res.data.items?.[0];
  if (!c?.id) {
    return null;
  }

  return {
    id: c.id,
    title: c.snippet?.title || "",
    description: c.snippet?.description || "",
    customUrl: c.snippet?.customUrl || undefined,
    subscriberCount: toCount(c.statistics?.subscriberCount),
    videoCount: toCount(c.statistics?.videoCount),
    viewCount: toCount(c.statistics?.viewCount),
    uploadsPlaylistId: c.contentDetails?.relatedPlaylists?.uploads || undefined,
  };
}

// ============================================================================
// Playlists
// ============================================================================

export interface PlaylistVideo {
  videoId: string;
  title: string;
  publishedAt: string;
}

export interface PlaylistPage {
  items: PlaylistVideo[];
  nextPageToken?: string;
}

export async function listPlaylistPage(
  youtube: youtube_v3.Youtube,
  playlistId: string,
  pageToken?: string,
  maxResults: number = PAGE_SIZE
): Promise<PlaylistPage> {
  const res = await youtube.playlistItems.list({
    part: ["snippet", "contentDetails"],
    playlistId,
    maxResults,
    pageToken,
  });

  const items: PlaylistVideo[] = [];
  for (const item of res.data.items || []) {
    const videoId = item.contentDetails?.videoId;
    if (!videoId) continue;
    items.push({
      videoId,
      title: item.snippet?.title || "",
      publishedAt: item.snippet?.publishedAt || item.contentDetails?.videoPublishedAt || "",
    });
  }

  return { items, nextPageToken: res.data.nextPageToken || undefined };
}

export type PageFetcher = (pageToken?: string, maxResults?: number) => Promise<PlaylistPage>;

/**
 * Follow continuation tokens until the playlist is exhausted or `limit`
 * videos have been collected.
 */
export async function collectPages(fetchPage: PageFetcher, limit?: number): Promise<PlaylistVideo[]> {
  const videos: PlaylistVideo[] = [];
  let pageToken: string | undefined;

  do {
    const remaining = limit === undefined ? PAGE_SIZE : limit - videos.length;
    const page = await fetchPage(pageToken, Math.min(PAGE_SIZE, remaining));
    videos.push(...page.items);
    pageToken = page.nextPageToken;
  } while (pageToken && (limit === undefined || videos.length < limit));

  return limit === undefined ? videos : videos.slice(0, limit);
}

export function listUploads(
  youtube: youtube_v3.Youtube,
  playlistId: string,
  limit?: number
): Promise<PlaylistVideo[]> {
  return collectPages(
    (pageToken, maxResults) => listPlaylistPage(youtube, playlistId, pageToken, maxResults),
    limit
  );
}

// ============================================================================
// Videos
// ============================================================================

export interface VideoInfo {
  id: string;
  title: string;
  description: string;
  publishedAt: string;
  channelId: string;
  channelTitle: string;
  tags: string[];
  viewCount: number;
  likeCount: number;
  commentCount: number;
  duration?: string;
  definition?: string;
  privacyStatus?: string;
}

function toVideoInfo(v: youtube_v3.Schema$Video): VideoInfo | null {
  if (!v.id) return null;
  return {
    id: v.id,
    title: v.snippet?.title || "",
    description: v.snippet?.description || "",
    publishedAt: v.snippet?.publishedAt || "",
    channelId: v.snippet?.channelId || "",
    channelTitle: v.snippet?.channelTitle || "",
    tags: v.snippet?.tags || [],
    viewCount: toCount(v.statistics?.viewCount),
    likeCount: toCount(v.statistics?.likeCount),
    commentCount: toCount(v.statistics?.commentCount),
    duration: v.contentDetails?.duration || undefined,
    definition: v.contentDetails?.definition || undefined,
    privacyStatus: v.status?.privacyStatus || undefined,
  };
}

/**
 * Details for any number of videos, fetched 50 ids per request.
 */
export async function getVideos(
  youtube: youtube_v3.Youtube,
  ids: string[]
): Promise<VideoInfo[]> {
  const videos: VideoInfo[] = [];
  for (let i = 0; i < ids.length; i += PAGE_SIZE) {
    const res = await youtube.videos.list({
      part: ["snippet", "statistics", "contentDetails", "status"],
      id: ids.slice(i, i + PAGE_SIZE),
      maxResults: PAGE_SIZE,
    });
    for (const item of res.data.items || []) {
      const info = toVideoInfo(item);
      if (info) videos.push(info);
    }
  }
  return videos;
}

export async function getVideo(
  youtube: youtube_v3.Youtube,
  videoId: string
): Promise<VideoInfo | null> {
  const [video] = await getVideos(youtube, [videoId]);
  return video ?? null;
}

// ============================================================================
// Search
// ============================================================================

/**
 * Search one channel's videos. Costs 100 quota units per call.
 */
export async function searchChannelVideos(
  youtube: youtube_v3.Youtube,
  channelId: string,
  query: string,
  maxResults: number = 10
): Promise<PlaylistVideo[]> {
  const res = await youtube.search.list({
    part: ["snippet"],
    channelId,
    q: query,
    type: ["video"],
    maxResults,
    order: "relevance",
  });

  const results: PlaylistVideo[] = [];
  for (const item of res.data.items || []) {
    const videoId = item.id?.videoId;
    if (!videoId) continue;
    results.push({
      videoId,
      title: item.snippet?.title || "",
      publishedAt: item.snippet?.publishedAt || "",
    });
  }
  return results;
}

// ============================================================================
// Comments
// ============================================================================

export interface CommentInfo {
  id: string;
  authorDisplayName: string;
  textDisplay: string;
  likeCount: number;
  publishedAt: string;
}

export async function listComments(
  youtube: youtube_v3.Youtube,
  videoId: string,
  maxResults: number = 10
): Promise<CommentInfo[]> {
  const res = await youtube.commentThreads.list({
    part: ["snippet"],
    videoId,
    maxResults,
    order: "relevance",
  });

  return (res.data.items || []).map((thread) => {
    const comment = thread.snippet?.topLevelComment?.snippet;
    return {
      id: thread.id || "",
      authorDisplayName: comment?.authorDisplayName || "",
      textDisplay: comment?.textDisplay || "",
      likeCount: comment?.likeCount || 0,
      publishedAt: comment?.publishedAt || "",
    };
  });
}

// ============================================================================
// Catalog seam for the transcript cache
// ============================================================================

export interface VideoSnippet {
  title: string;
  publishedAt: string;
  channelId: string;
  channelTitle: string;
}

/**
 * The slice of the Data API the transcript cache depends on.
 */
export interface ChannelCatalog {
  getMyChannel(): Promise<ChannelInfo | null>;
  listPlaylistPage(playlistId: string, pageToken?: string, maxResults?: number): Promise<PlaylistPage>;
  getVideoSnippet(videoId: string): Promise<VideoSnippet | null>;
}

export function createChannelCatalog(youtube: youtube_v3.Youtube): ChannelCatalog {
  return {
    getMyChannel: () => getMyChannel(youtube),
    listPlaylistPage: (playlistId, pageToken, maxResults) =>
      listPlaylistPage(youtube, playlistId, pageToken, maxResults),
    async getVideoSnippet(videoId) {
      const video = await getVideo(youtube, videoId);
      if (!video) return null;
      return {
        title: video.title,
        publishedAt: video.publishedAt,
        channelId: video.channelId,
        channelTitle: video.channelTitle,
      };
    },
  };
}
