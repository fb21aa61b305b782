import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { formatTimestamp } from "../format.js";
import { TranscriptCache } from "./cache.js";
import { searchSegments, searchTranscripts, summarizeIndex } from "./search.js";
import type { Ownership, TranscriptRecord, TranscriptSegment } from "./types.js";

function record(videoId: string, segments: TranscriptSegment[], ownership: Ownership = "own"): TranscriptRecord {
  return {
    video_id: videoId,
    title: `Title ${videoId}`,
    published_at: "2024-01-01T00:00:00Z",
    channel_name: "My Channel",
    is_own_video: ownership === "own",
    ownership,
    segments,
    full_text: segments.map((s) => s.text).join(" "),
  };
}

describe("searchTranscripts", () => {
  let root: string;
  let cache: TranscriptCache;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "youtube-skill-search-"));
    cache = new TranscriptCache(path.join(root, "transcripts"), path.join(root, "transcript_index.json"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("matches case-insensitively and keeps the segment's timestamp", async () => {
    await cache.write(record("vid1", [{ start: 42, text: "hello world" }]));

    const matches = await searchTranscripts(cache, "HELLO");

    expect(matches).toEqual([
      { videoId: "vid1", title: "Title vid1", start: 42, text: "hello world", ownership: "own" },
    ]);
    expect(formatTimestamp(matches[0].start)).toBe("0:42");
  });

  it("orders matches by video and then time", async () => {
    await cache.write(
      record("b-video", [
        { start: 30, text: "cache later" },
        { start: 10, text: "cache early" },
      ])
    );
    await cache.write(record("a-video", [{ start: 99, text: "Cache it" }], "external"));

    const matches = await searchTranscripts(cache, "cache");

    expect(matches.map((m) => [m.videoId, m.start, m.ownership])).toEqual([
      ["a-video", 99, "external"],
      ["b-video", 10, "own"],
      ["b-video", 30, "own"],
    ]);
  });

  it("keeps an unchecked owner as unknown rather than external", async () => {
    await cache.write(record("u-video", [{ start: 3, text: "cache unsure" }], "unknown"));

    const matches = await searchTranscripts(cache, "cache");

    expect(matches.map((m) => m.ownership)).toEqual(["unknown"]);
  });

  it("finds nothing in an empty cache", async () => {
    expect(await searchTranscripts(cache, "anything")).toEqual([]);
  });
});

describe("searchSegments", () => {
  const segments: TranscriptSegment[] = [
    { start: 0, text: "intro" },
    { start: 2, text: "never gonna" },
    { start: 4, text: "give you up" },
    { start: 6, text: "middle" },
    { start: 8, text: "more" },
    { start: 10, text: "outro" },
  ];

  it("finds a phrase that spans caption boundaries", () => {
    const lyrics: TranscriptSegment[] = [
      { start: 0, text: "never gonna" },
      { start: 2, text: "give you up" },
      { start: 4, text: "outro" },
    ];
    expect(searchSegments(lyrics, "Gonna Give", 0)).toEqual([{ start: 0, text: "never gonna" }]);
  });

  it("includes surrounding segments without repeats", () => {
    expect(searchSegments(segments, "give", 1).map((s) => s.start)).toEqual([0, 2, 4, 6]);
  });

  it("returns nothing when the phrase is absent", () => {
    expect(searchSegments(segments, "banana")).toEqual([]);
  });
});

describe("summarizeIndex", () => {
  it("counts own, external and unknown-owner videos and lists recent transcripts first", () => {
    const summary = summarizeIndex(
      {
        videos: {
          old: { title: "Old", published_at: "2023-01-01", has_transcript: true, is_own_video: true, ownership: "own" },
          new: { title: "New", published_at: "2024-06-01", has_transcript: true, is_own_video: true, ownership: "own" },
          none: { title: "None", published_at: "2024-07-01", has_transcript: false, is_own_video: true, ownership: "own" },
          ext: { title: "Ext", published_at: "2024-05-01", has_transcript: true, is_own_video: false, ownership: "external" },
          unk: { title: "Unk", published_at: "2023-06-01", has_transcript: true, is_own_video: false, ownership: "unknown" },
        },
      },
      2
    );

    expect(summary.ownWithTranscript).toBe(2);
    expect(summary.ownWithout).toBe(1);
    expect(summary.external).toBe(1);
    expect(summary.unknown).toBe(1);
    expect(summary.recent.map((v) => v.videoId)).toEqual(["new", "ext"]);
  });
});
