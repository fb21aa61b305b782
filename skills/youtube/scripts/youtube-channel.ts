#!/usr/bin/env npx tsx

/**
 * YouTube Channel CLI - Channel info, uploads and in-channel search
 */

import type { youtube_v3 } from "googleapis";
import { friendlyApiError, isApiError } from "../../../scripts/lib/api-errors.js";
import { CREDENTIALS_PATH } from "../../../scripts/lib/config.js";
import {
  output,
  fail,
  intFlag,
  parseArgs,
  report,
  reportApiError,
} from "../../../scripts/lib/output.js";
import {
  renderChannelInfo,
  renderChannelSearch,
  renderChannelVideos,
  type ChannelVideoRow,
} from "../../../scripts/lib/reports/channel.js";
import {
  getMyChannel,
  getVideos,
  getYouTubeClient,
  listUploads,
  searchChannelVideos,
  type ChannelInfo,
} from "../../../scripts/lib/youtube-api.js";

const NO_CHANNEL = "No channel found for authenticated user.";

async function requireChannel(youtube: youtube_v3.Youtube): Promise<ChannelInfo> {
  const channel = await getMyChannel(youtube);
  if (!channel) fail(NO_CHANNEL);
  return channel;
}

async function channelVideos(
  youtube: youtube_v3.Youtube,
  max: number,
  order: string
): Promise<ChannelVideoRow[]> {
  const channel = await requireChannel(youtube);
  if (!channel.uploadsPlaylistId) {
    return [];
  }

  const uploads = await listUploads(youtube, channel.uploadsPlaylistId, max);
  const details = await getVideos(youtube, uploads.map((u) => u.videoId));
  const views = new Map(details.map((v) => [v.id, v.viewCount]));

  const rows = uploads.map((u) => ({ ...u, views: views.get(u.videoId) ?? 0 }));
  if (order === "viewCount") {
    rows.sort((a, b) => b.views - a.views);
  }
  return rows;
}

function printUsage(): void {
  console.log(`
YouTube Channel CLI

COMMANDS:
  info                    Show your channel's details and statistics
  videos                  List your uploads
    --max=N               Max videos (default: 10)
    --order=ORDER         date or viewCount (default: date)
  search <query>          Search within your channel (100 quota units)
    --max=N               Max results (default: 10)

OPTIONS:
  --json                  Print a JSON result instead of text

EXAMPLES:
  npx tsx skills/youtube/scripts/youtube-channel.ts info
  npx tsx skills/youtube/scripts/youtube-channel.ts videos --max=25 --order=viewCount
  npx tsx skills/youtube/scripts/youtube-channel.ts search "typescript"

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

  try {
    switch (command) {
      case "info": {
        const youtube = await getYouTubeClient();
        const channel = await requireChannel(youtube);
        report(flags, renderChannelInfo(channel), channel);
        break;
      }

      case "videos": {
        const order = flags.order || "date";
        if (order !== "date" && order !== "viewCount") {
          fail("Invalid --order. Use: date or viewCount");
        }
        const youtube = await getYouTubeClient();
        const videos = await channelVideos(youtube, intFlag(flags, "max", 10), order);
        report(flags, renderChannelVideos(videos), { videos, count: videos.length });
        break;
      }

      case "search": {
        const query = positional.join(" ") || flags.query;
        if (!query) fail("Query required. Usage: youtube-channel.ts search <query>");
        const youtube = await getYouTubeClient();
        const channel = await requireChannel(youtube);
        const results = await searchChannelVideos(youtube, channel.id, query, intFlag(flags, "max", 10));
        report(flags, renderChannelSearch(results, query), { results, count: results.length });
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
