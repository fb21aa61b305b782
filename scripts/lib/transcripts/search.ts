import { compareIds, type TranscriptCache } from "./cache.js";
import type { Ownership, TranscriptIndex, TranscriptIndexEntry, TranscriptSegment } from "./types.js";

export interface SearchMatch {
  videoId: string;
  title: string;
  start: number;
  text: string;
  ownership: Ownership;
}

/**
 * Case-insensitive substring scan over every cached segment, ordered by
 * video id and then timestamp.
 */
export async function searchTranscripts(
  cache: TranscriptCache,
  query: string
): Promise<SearchMatch[]> {
  const needle = query.toLowerCase();
  const matches: SearchMatch[] = [];

  for (const record of await cache.list()) {
    for (const segment of record.segments) {
      if (segment.text.toLowerCase().includes(needle)) {
        matches.push({
          videoId: record.video_id,
          title: record.title,
          start: segment.start,
          text: segment.text,
          ownership: record.ownership,
        });
      }
    }
  }

  return matches.sort((a, b) => compareIds(a.videoId, b.videoId) || a.start - b.start);
}

// Phrases often straddle caption boundaries, so each segment is matched
// together with the next two.
const WINDOW = 3;

/**
 * Phrase search within one transcript. Each hit brings `context` segments on
 * either side; the result is in transcript order without repeats.
 */
export function searchSegments(
  segments: TranscriptSegment[],
  query: string,
  context = 1
): TranscriptSegment[] {
  const needle = query.toLowerCase();
  const picked = new Set<number>();

  segments.forEach((_, i) => {
    const window = segments
      .slice(i, i + WINDOW)
      .map((s) => s.text.toLowerCase())
      .join(" ");
    if (!window.includes(needle)) return;

    const from = Math.max(0, i - context);
    const to = Math.min(segments.length, i + context + 1);
    for (let j = from; j < to; j++) {
      picked.add(j);
    }
  });

  return [...picked].sort((a, b) => a - b).map((i) => segments[i]);
}

export interface IndexSummary {
  ownWithTranscript: number;
  ownWithout: number;
  external: number;
  /** Videos whose channel could not be checked */
  unknown: number;
  recent: Array<{ videoId: string } & TranscriptIndexEntry>;
}

export function summarizeIndex(index: TranscriptIndex, recentLimit = 15): IndexSummary {
  const entries = Object.entries(index.videos);
  const recent = entries
    .filter(([, info]) => info.has_transcript)
    .sort(([, a], [, b]) => compareIds(b.published_at, a.published_at))
    .slice(0, recentLimit)
    .map(([videoId, info]) => ({ videoId, ...info }));

  return {
    ownWithTranscript: entries.filter(([, v]) => v.has_transcript && v.ownership === "own").length,
    ownWithout: entries.filter(([, v]) => !v.has_transcript && v.ownership === "own").length,
    external: entries.filter(([, v]) => v.ownership === "external").length,
    unknown: entries.filter(([, v]) => v.ownership === "unknown").length,
    recent,
  };
}
