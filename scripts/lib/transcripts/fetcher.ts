import type {
  TranscriptFetchResult,
  TranscriptFetcher,
  TranscriptSegment,
  UnavailableReason,
} from "./types.js";

/**
 * Raised by a caption source when a video has no usable track.
 */
export class TranscriptUnavailableError extends Error {
  constructor(
    readonly reason: UnavailableReason,
    message: string
  ) {
    super(message);
    this.name = "TranscriptUnavailableError";
  }
}

export interface RawCaption {
  /** Seconds, possibly fractional */
  offset: number;
  text: string;
}

export interface CaptionTrack {
  language: string;
  captions: RawCaption[];
}

/**
 * Fetches one caption track. Without `lang` the source picks the first
 * track the video offers.
 */
export interface CaptionSource {
  fetchTrack(videoId: string, lang?: string): Promise<CaptionTrack>;
}

export const PREFERRED_LANGUAGES = ["en", "en-US", "en-GB"];

export function normalizeCaptions(captions: RawCaption[]): TranscriptSegment[] {
  return captions.map((c) => ({
    start: Math.floor(c.offset),
    text: c.text.replace(/\n/g, " "),
  }));
}

export function joinSegments(segments: TranscriptSegment[]): string {
  return segments.map((s) => s.text).join(" ");
}

function toUnavailable(err: unknown): TranscriptFetchResult {
  if (err instanceof TranscriptUnavailableError) {
    return { status: "unavailable", reason: err.reason, message: err.message };
  }
  return {
    status: "unavailable",
    reason: "error",
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * English first, in the order given, then whatever the video offers.
 * A missing language moves on to the next one; any other failure ends the
 * attempt for this video.
 */
export function createTranscriptFetcher(
  source: CaptionSource,
  languages: string[] = PREFERRED_LANGUAGES
): TranscriptFetcher {
  const attempt = async (videoId: string, lang?: string): Promise<TranscriptFetchResult> => {
    try {
      const track = await source.fetchTrack(videoId, lang);
      if (track.captions.length === 0) {
        return { status: "unavailable", reason: "not-found", message: "Transcript is empty" };
      }
      return { status: "ok", language: track.language, segments: normalizeCaptions(track.captions) };
    } catch (err) {
      return toUnavailable(err);
    }
  };

  return {
    async fetch(videoId) {
      for (const lang of languages) {
        const result = await attempt(videoId, lang);
        if (result.status === "ok" || result.reason !== "not-found") {
          return result;
        }
      }
      return attempt(videoId);
    },
  };
}
