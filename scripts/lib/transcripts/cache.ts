import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import type { TranscriptIndex, TranscriptIndexEntry, TranscriptRecord } from "./types.js";

const segmentSchema = z.object({
  start: z.number(),
  text: z.string(),
});

const ownershipSchema = z.enum(["own", "external", "unknown"]);

const recordSchema = z
  .object({
    video_id: z.string(),
    title: z.string(),
    published_at: z.string().default(""),
    channel_name: z.string().default("Unknown"),
    is_own_video: z.boolean().default(false),
    ownership: ownershipSchema.optional(),
    language: z.string().optional(),
    segments: z.array(segmentSchema).default([]),
    full_text: z.string().optional(),
  })
  .transform(
    (r): TranscriptRecord => ({
      ...r,
      ownership: r.ownership ?? (r.is_own_video ? "own" : "external"),
      full_text: r.full_text ?? r.segments.map((s) => s.text).join(" "),
    })
  );

const indexSchema = z.object({
  videos: z.record(
    z
      .object({
        title: z.string(),
        published_at: z.string().default(""),
        has_transcript: z.boolean(),
        is_own_video: z.boolean().default(false),
        ownership: ownershipSchema.optional(),
      })
      .transform(
        (v): TranscriptIndexEntry => ({
          ...v,
          ownership: v.ownership ?? (v.is_own_video ? "own" : "external"),
        })
      )
  ),
});

export function emptyIndex(): TranscriptIndex {
  return { videos: {} };
}

export function indexEntryFor(record: TranscriptRecord): TranscriptIndexEntry {
  return {
    title: record.title,
    published_at: record.published_at,
    has_transcript: true,
    is_own_video: record.is_own_video,
    ownership: record.ownership,
  };
}

/**
 * One JSON file per video plus a summary index, both under the config dir.
 * The two are kept consistent by the callers; nothing here cross-checks them.
 */
export class TranscriptCache {
  constructor(
    readonly dir: string,
    readonly indexPath: string
  ) {}

  pathFor(videoId: string): string {
    return path.join(this.dir, `${videoId}.json`);
  }

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  async has(videoId: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(videoId));
      return true;
    } catch {
      return false;
    }
  }

  async read(videoId: string): Promise<TranscriptRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(videoId), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return recordSchema.parse(JSON.parse(content));
  }

  async write(record: TranscriptRecord): Promise<void> {
    await this.ensureDir();
    await fs.writeFile(this.pathFor(record.video_id), JSON.stringify(record, null, 2));
  }

  /**
   * Every cached record, ordered by video id. Files that don't parse are
   * reported and left out.
   */
  async list(): Promise<TranscriptRecord[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const records: TranscriptRecord[] = [];
    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      const content = await fs.readFile(path.join(this.dir, file), "utf-8");
      const parsed = recordSchema.safeParse(safeJson(content));
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        console.error(`✗ Skipping unreadable transcript file: ${file}`);
      }
    }
    return records.sort((a, b) => compareIds(a.video_id, b.video_id));
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.dir);
      return true;
    } catch {
      return false;
    }
  }

  async loadIndex(): Promise<TranscriptIndex> {
    let content: string;
    try {
      content = await fs.readFile(this.indexPath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return emptyIndex();
      throw err;
    }
    return indexSchema.parse(JSON.parse(content));
  }

  async saveIndex(index: TranscriptIndex): Promise<void> {
    await fs.mkdir(path.dirname(this.indexPath), { recursive: true });
    await fs.writeFile(this.indexPath, JSON.stringify(index, null, 2));
  }
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function safeJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
