import {
  cleanCommentText,
  formatIsoDuration,
  formatNumber,
  formatTimestamp,
  truncate,
} from "../format.js";
import type { TranscriptSegment } from "../transcripts/types.js";
import type { CommentInfo, VideoInfo } from "../youtube-api.js";
import { videoLink } from "./transcripts.js";

export function renderVideoDetails(video: VideoInfo): string[] {
  return [
    `Title: ${video.title}`,
    `ID: ${video.id}`,
    `Channel: ${video.channelTitle}`,
    `Published: ${video.publishedAt}`,
    "",
    `Duration: ${video.duration ? formatIsoDuration(video.duration) : "N/A"}`,
    `Definition: ${(video.definition ?? "N/A").toUpperCase()}`,
    `Privacy: ${video.privacyStatus ?? "N/A"}`,
    "",
    `Views: ${formatNumber(video.viewCount)}`,
    `Likes: ${formatNumber(video.likeCount)}`,
    `Comments: ${formatNumber(video.commentCount)}`,
    "",
    `Tags: ${video.tags.slice(0, 10).join(", ")}`,
    "",
    "Description:",
    "-".repeat(40),
    video.description || "No description",
  ];
}

export function renderComments(comments: CommentInfo[]): string[] {
  if (comments.length === 0) {
    return ["No comments found."];
  }
  const lines = [`Top ${comments.length} comments:`, ""];
  for (const comment of comments) {
    const text = truncate(cleanCommentText(comment.textDisplay), 200);
    lines.push(`• ${comment.authorDisplayName} (${formatNumber(comment.likeCount)} likes)`);
    lines.push(...text.split("\n").map((line) => `  ${line}`));
    lines.push("");
  }
  return lines;
}

export function renderTranscriptHeader(videoId: string, language: string): string[] {
  return [`Transcript (${language}):`, `Video: ${videoLink(videoId)}`, "-".repeat(40)];
}

export function renderSegmentMatches(
  videoId: string,
  matches: TranscriptSegment[],
  query: string
): string[] {
  if (matches.length === 0) {
    return [`No matches found for: ${query}`];
  }
  const lines = [`Found ${matches.length} segments matching '${query}':`, ""];
  for (const segment of matches) {
    lines.push(
      `[${formatTimestamp(segment.start)}] ${segment.text}`,
      `       → ${videoLink(videoId, segment.start)}`,
      ""
    );
  }
  return lines;
}
