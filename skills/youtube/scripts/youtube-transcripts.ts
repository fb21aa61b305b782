#!/usr/bin/env npx tsx

/**
 * YouTube Transcripts CLI - Local caption cache for your channel and any
 * video you look up
 */

import { authorize } from "../../../scripts/lib/auth.js";
import { CREDENTIALS_PATH, getTranscriptIndexPath, getTranscriptsDir } from "../../../scripts/lib/config.js";
import { friendlyApiError, isApiError } from "../../../scripts/lib/api-errors.js";
import { fail, intFlag, output, parseArgs, report, reportApiError, reportMessage } from "../../../scripts/lib/output.js";
import {
  renderIndexSummary,
  renderSearchResults,
  renderSyncSummary,
  renderTranscript,
  describeUnavailable,
  videoLink,
} from "../../../scripts/lib/reports/transcripts.js";
import { TranscriptCache } from "../../../scripts/lib/transcripts/cache.js";
import { getTranscript } from "../../../scripts/lib/transcripts/get.js";
import { searchTranscripts, summarizeIndex } from "../../../scripts/lib/transcripts/search.js";
import { syncChannel } from "../../../scripts/lib/transcripts/sync.js";
import { createDefaultTranscriptFetcher } from "../../../scripts/lib/transcripts/youtube-transcript-source.js";
import type { TranscriptRecord } from "../../../scripts/lib/transcripts/types.js";
import { createChannelCatalog, getYouTubeClient, type ChannelCatalog } from "../../../scripts/lib/youtube-api.js";

/**
 * Catalog that authenticates on first use. `get` works without a token for
 * the captions themselves; only the ownership lookup needs one.
 */
function lazyCatalog(): ChannelCatalog {
  let catalog: Promise<ChannelCatalog> | undefined;
  const resolve = (): Promise<ChannelCatalog> => {
    catalog ??= authorize().then(async (auth) => createChannelCatalog(await getYouTubeClient(auth)));
    return catalog;
  };
  return {
    getMyChannel: async () => (await resolve()).getMyChannel(),
    listPlaylistPage: async (playlistId, pageToken, maxResults) =>
      (await resolve()).listPlaylistPage(playlistId, pageToken, maxResults),
    getVideoSnippet: async (videoId) => (await resolve()).getVideoSnippet(videoId),
  };
}

function recordHeader(record: TranscriptRecord): string[] {
  const lines = [
    `Title: ${record.title}`,
    `Channel: ${record.channel_name}`,
    `Video: ${videoLink(record.video_id)}`,
  ];
  if (record.ownership === "external") {
    lines.push("Note: External video (not from your channel)");
  }
  return lines;
}

function printUsage(): void {
  console.log(`
YouTube Transcripts CLI

COMMANDS:
  sync                    Download captions for every upload on your channel
    --force               Re-download transcripts that are already cached
  search <query>          Search all cached transcripts
    --max=N               Max matches (default: 20)
  list                    Summarize the transcript index
  get <videoId>           Transcript for any video (cached after first fetch)
    --timed               Include timestamps

OPTIONS:
  --json                  Print a JSON result instead of text

EXAMPLES:
  npx tsx skills/youtube/scripts/youtube-transcripts.ts sync
  npx tsx skills/youtube/scripts/youtube-transcripts.ts search "state machine" --max=10
  npx tsx skills/youtube/scripts/youtube-transcripts.ts get dQw4w9WgXcQ --timed

Transcripts: ${getTranscriptsDir()}
Credentials: ${CREDENTIALS_PATH}
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const { flags, positional } = parseArgs(args.slice(1));

  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  const cache = new TranscriptCache(getTranscriptsDir(), getTranscriptIndexPath());

  try {
    switch (command) {
      case "sync": {
        const youtube = await getYouTubeClient();
        const summary = await syncChannel({
          catalog: createChannelCatalog(youtube),
          fetcher: createDefaultTranscriptFetcher(),
          cache,
          force: "force" in flags,
          onEnumerated: (title, total) => {
            console.error(`Syncing transcripts for: ${title}`);
            console.error(`Found ${total} videos\n`);
          },
          onProgress: ({ position, total, video, result }) => {
            const status =
              result.status === "ok" ? `✓ (${result.segments.length} segments)` : "✗ (no captions)";
            console.error(`[${position}/${total}] ${video.title.slice(0, 50)}... ${status}`);
          },
        });
        if (!summary) fail("No channel found for authenticated user.");
        report(flags, renderSyncSummary(summary, cache.dir), { ...summary, storageDir: cache.dir });
        break;
      }

      case "search": {
        const query = positional.join(" ") || flags.query;
        if (!query) fail("Query required. Usage: youtube-transcripts.ts search <query>");
        if (!(await cache.exists())) {
          reportMessage(flags, "No transcripts found. Run 'sync' first.");
          break;
        }
        const max = intFlag(flags, "max", 20);
        const matches = await searchTranscripts(cache, query);
        report(flags, renderSearchResults(matches, query, max), {
          query,
          total: matches.length,
          matches: matches.slice(0, max),
        });
        break;
      }

      case "list": {
        const index = await cache.loadIndex();
        if (Object.keys(index.videos).length === 0) {
          reportMessage(flags, "No transcripts indexed. Run 'sync' first.");
          break;
        }
        const summary = summarizeIndex(index);
        report(flags, renderIndexSummary(summary, cache.dir), { ...summary, storageDir: cache.dir });
        break;
      }

      case "get": {
        const videoId = positional[0];
        if (!videoId) fail("Video ID required. Usage: youtube-transcripts.ts get <videoId>");
        const result = await getTranscript(videoId, {
          cache,
          fetcher: createDefaultTranscriptFetcher(),
          catalog: lazyCatalog(),
        });

        if (result.status === "unavailable") {
          reportApiError(flags, describeUnavailable(result.reason, result.message));
          break;
        }

        const { record } = result;
        const lines = recordHeader(record);
        if (result.status === "fetched") {
          console.error(`✓ Cached transcript for ${videoId}`);
          if (result.ownership.kind === "unknown") {
            lines.push(`Note: Could not determine ownership (${result.ownership.reason})`);
          }
        }
        lines.push("-".repeat(40), ...renderTranscript(record, "timed" in flags));
        report(flags, lines, { ...record, cached: result.status === "cached" });
        break;
      }

      default:
        output({ success: false, error: `Unknown command: ${command}. Run with --help for usage.` });
        process.exit(1);
    }
  } catch (err) {
    if (isApiError(err)) {
      reportApiError(flags, friendlyApiError(err));
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    fail(message);
  }
}

main().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
