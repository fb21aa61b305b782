import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError,
} from "youtube-transcript";
import { createTranscriptFetcher, TranscriptUnavailableError, type CaptionSource } from "./fetcher.js";
import type { TranscriptFetcher } from "./types.js";

// srv3 tracks time paragraphs in milliseconds; the older <text> format uses seconds
const SRV3_PARAGRAPH = /<p\s+t="\d+"\s+d="\d+"/;

type TimingUnit = "seconds" | "milliseconds";

/**
 * Wraps the global fetch and notes which caption format came back, since
 * the library passes the track's raw times through in either unit.
 */
function unitTrackingFetch(): { fetch: typeof fetch; unit: () => TimingUnit } {
  let unit: TimingUnit = "seconds";
  const tracked: typeof fetch = async (input, init) => {
    const response = await fetch(input, init);
    if (response.ok && SRV3_PARAGRAPH.test(await response.clone().text())) {
      unit = "milliseconds";
    }
    return response;
  };
  return { fetch: tracked, unit: () => unit };
}

function classify(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  if (err instanceof YoutubeTranscriptDisabledError) {
    return new TranscriptUnavailableError("disabled", err.message);
  }
  if (
    err instanceof YoutubeTranscriptNotAvailableLanguageError ||
    err instanceof YoutubeTranscriptNotAvailableError
  ) {
    return new TranscriptUnavailableError("not-found", err.message);
  }
  if (err instanceof YoutubeTranscriptVideoUnavailableError) {
    return new TranscriptUnavailableError("video-unavailable", err.message);
  }
  if (err instanceof YoutubeTranscriptTooManyRequestError) {
    return new TranscriptUnavailableError("rate-limited", err.message);
  }
  return err;
}

export const youtubeTranscriptSource: CaptionSource = {
  async fetchTrack(videoId, lang) {
    try {
      const tracking = unitTrackingFetch();
      const items = await YoutubeTranscript.fetchTranscript(videoId, { lang, fetch: tracking.fetch });
      const scale = tracking.unit() === "milliseconds" ? 1000 : 1;
      return {
        language: items[0]?.lang ?? lang ?? "unknown",
        captions: items.map((item) => ({ offset: item.offset / scale, text: item.text })),
      };
    } catch (err) {
      throw classify(err);
    }
  },
};

export function createDefaultTranscriptFetcher(): TranscriptFetcher {
  return createTranscriptFetcher(youtubeTranscriptSource);
}
