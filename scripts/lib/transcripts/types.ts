export interface TranscriptSegment {
  /** Whole seconds from the start of the video */
  start: number;
  text: string;
}

export type Ownership = "own" | "external" | "unknown";

export interface TranscriptRecord {
  video_id: string;
  title: string;
  published_at: string;
  channel_name: string;
  is_own_video: boolean;
  ownership: Ownership;
  language?: string;
  segments: TranscriptSegment[];
  full_text: string;
}

export interface TranscriptIndexEntry {
  title: string;
  published_at: string;
  has_transcript: boolean;
  is_own_video: boolean;
  ownership: Ownership;
}

export interface TranscriptIndex {
  videos: Record<string, TranscriptIndexEntry>;
}

export type UnavailableReason =
  | "disabled"
  | "not-found"
  | "video-unavailable"
  | "rate-limited"
  | "error";

export type TranscriptFetchResult =
  | { status: "ok"; language: string; segments: TranscriptSegment[] }
  | { status: "unavailable"; reason: UnavailableReason; message: string };

export interface TranscriptFetcher {
  fetch(videoId: string): Promise<TranscriptFetchResult>;
}
