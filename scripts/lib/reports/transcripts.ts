import { ellipsize, formatTimestamp, truncate } from "../format.js";
import { joinSegments } from "../transcripts/fetcher.js";
import type { IndexSummary, SearchMatch } from "../transcripts/search.js";
import type { SyncSummary } from "../transcripts/sync.js";
import type {
  Ownership,
  TranscriptRecord,
  TranscriptSegment,
  UnavailableReason,
} from "../transcripts/types.js";

const UNAVAILABLE_MESSAGES: Record<UnavailableReason, string> = {
  disabled: "Transcripts are disabled for this video.",
  "video-unavailable": "Video is unavailable (private, deleted, or region-locked).",
  "not-found": "No transcript found for this video.",
  "rate-limited": "YouTube is rate limiting transcript requests. Try again later.",
  error: "Error fetching transcript.",
};

export function describeUnavailable(reason: UnavailableReason, detail: string): string {
  const message = UNAVAILABLE_MESSAGES[reason];
  return reason === "error" ? `${message} ${detail}` : message;
}

export function videoLink(videoId: string, start?: number): string {
  return start === undefined ? `https://youtu.be/${videoId}` : `https://youtu.be/${videoId}?t=${start}`;
}

const OWNERSHIP_MARKERS: Record<Ownership, string> = {
  own: "",
  external: " [external]",
  unknown: " [owner unknown]",
};

export function renderSearchResults(matches: SearchMatch[], query: string, max: number): string[] {
  if (matches.length === 0) {
    return [`No matches found for '${query}'`];
  }

  const lines = [`Found ${matches.length} matches for '${query}':`];
  let currentVideo: string | undefined;

  for (const match of matches.slice(0, max)) {
    if (match.videoId !== currentVideo) {
      currentVideo = match.videoId;
      lines.push("", `📹 ${truncate(match.title, 60)}${OWNERSHIP_MARKERS[match.ownership]}`);
    }
    lines.push(`  [${formatTimestamp(match.start)}] "${ellipsize(match.text, 80)}"`);
    lines.push(`         ${videoLink(match.videoId, match.start)}`);
  }

  if (matches.length > max) {
    lines.push(`... and ${matches.length - max} more matches`);
  }
  return lines;
}

export function renderSegments(segments: TranscriptSegment[], timed: boolean): string[] {
  if (timed) {
    return segments.map((s) => `[${formatTimestamp(s.start)}] ${s.text}`);
  }
  return [joinSegments(segments)];
}

/** A stored transcript; the plain form is the record's own full text. */
export function renderTranscript(record: TranscriptRecord, timed: boolean): string[] {
  return timed ? renderSegments(record.segments, true) : [record.full_text];
}

export function renderIndexSummary(summary: IndexSummary, storageDir: string): string[] {
  const lines = [
    "Transcript Index",
    `  Your videos: ${summary.ownWithTranscript} with captions, ${summary.ownWithout} without`,
  ];
  if (summary.external) {
    lines.push(`  External videos: ${summary.external}`);
  }
  if (summary.unknown) {
    lines.push(`  Owner unknown: ${summary.unknown}`);
  }
  lines.push(`  Storage: ${storageDir}`, "", "Recent videos with transcripts:");
  for (const video of summary.recent) {
    lines.push(`  • ${truncate(video.title, 55)}${OWNERSHIP_MARKERS[video.ownership]} (${video.videoId})`);
  }
  return lines;
}

export function renderSyncSummary(summary: SyncSummary, storageDir: string): string[] {
  return [
    "",
    `Done: ${summary.synced} synced, ${summary.skipped} skipped, ${summary.failed} no captions`,
    `Transcripts saved to: ${storageDir}`,
  ];
}
