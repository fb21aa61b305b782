#!/usr/bin/env npx tsx

/**
 * YouTube Analytics CLI - Studio analytics for your channel
 */

import {
  createReportQuery,
  getAnalyticsClient,
  getDateRange,
  getDemographics,
  getGeography,
  getOverview,
  getTopVideos,
  getTrafficSources,
  getVideoStats,
} from "../../../scripts/lib/analytics.js";
import { friendlyApiError, isApiError } from "../../../scripts/lib/api-errors.js";
import { loadToken } from "../../../scripts/lib/auth.js";
import { CREDENTIALS_PATH } from "../../../scripts/lib/config.js";
import {
  output,
  fail,
  intFlag,
  parseArgs,
  report,
  reportApiError,
  reportMessage,
} from "../../../scripts/lib/output.js";
import {
  renderDemographics,
  renderGeography,
  renderOverview,
  renderTopVideos,
  renderTraffic,
  renderVideoStats,
} from "../../../scripts/lib/reports/analytics.js";
import { getMyChannel, getVideos, getYouTubeClient } from "../../../scripts/lib/youtube-api.js";

function printUsage(): void {
  console.log(`
YouTube Analytics CLI

COMMANDS:
  overview                Channel overview
  top-videos              Top performing videos
    --max=N               Max videos (default: 10)
  video <videoId>         Single video stats
  demographics            Age/gender breakdown
  traffic                 Traffic sources
  geography               Views by country

OPTIONS (all commands):
  --days=N                Days to analyze (default: 28)
  --json                  Print a JSON result instead of text

EXAMPLES:
  npx tsx skills/youtube/scripts/youtube-analytics.ts overview --days=7
  npx tsx skills/youtube/scripts/youtube-analytics.ts top-videos --max=5
  npx tsx skills/youtube/scripts/youtube-analytics.ts video dQw4w9WgXcQ

Credentials: ${CREDENTIALS_PATH}
`);
}

const COMMANDS = ["overview", "top-videos", "video", "demographics", "traffic", "geography"];

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const { flags, positional } = parseArgs(args.slice(1));

  if (!command || command === "help" || command === "--help") {
    printUsage();
    process.exit(0);
  }

  if (!COMMANDS.includes(command)) {
    output({ success: false, error: `Unknown command: ${command}. Run with --help for usage.` });
    process.exit(1);
  }

  try {
    const auth = await loadToken();
    const youtube = await getYouTubeClient(auth);
    const query = createReportQuery(await getAnalyticsClient(auth));

    const channel = await getMyChannel(youtube);
    if (!channel) fail("No channel found for authenticated user.");
    const range = getDateRange(intFlag(flags, "days", 28));

    switch (command) {
      case "overview": {
        const overview = await getOverview(query, channel.id, range);
        if (!overview) {
          reportMessage(flags, "No data available for this period.");
          break;
        }
        report(flags, renderOverview(overview, range), { range, ...overview });
        break;
      }

      case "top-videos": {
        const max = intFlag(flags, "max", 10);
        const videos = await getTopVideos(query, channel.id, range, max);
        if (videos.length === 0) {
          reportMessage(flags, "No data available for this period.");
          break;
        }
        const details = await getVideos(youtube, videos.map((v) => v.videoId));
        const titles = new Map(details.map((d) => [d.id, d.title]));
        report(flags, renderTopVideos(videos, titles, range, max), {
          range,
          videos: videos.map((v) => ({ ...v, title: titles.get(v.videoId) })),
        });
        break;
      }

      case "video": {
        const videoId = positional[0];
        if (!videoId) fail("Video ID required. Usage: youtube-analytics.ts video <videoId>");
        const details = await getVideos(youtube, [videoId]);
        const title = details[0]?.title ?? videoId;
        const stats = await getVideoStats(query, channel.id, range, videoId);
        if (!stats) {
          reportMessage(flags, `No data available for video: ${videoId}`);
          break;
        }
        report(flags, renderVideoStats(stats, videoId, title, range), { range, videoId, title, ...stats });
        break;
      }

      case "demographics": {
        const shares = await getDemographics(query, channel.id, range);
        if (shares.length === 0) {
          reportMessage(flags, "No demographic data available.");
          break;
        }
        report(flags, renderDemographics(shares, range), { range, shares });
        break;
      }

      case "traffic": {
        const sources = await getTrafficSources(query, channel.id, range);
        if (sources.length === 0) {
          reportMessage(flags, "No traffic data available.");
          break;
        }
        report(flags, renderTraffic(sources, range), { range, sources });
        break;
      }

      case "geography": {
        const countries = await getGeography(query, channel.id, range);
        if (countries.length === 0) {
          reportMessage(flags, "No geographic data available.");
          break;
        }
        report(flags, renderGeography(countries, range), { range, countries });
        break;
      }
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
