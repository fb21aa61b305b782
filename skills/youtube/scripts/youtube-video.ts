#!/usr/bin/env npx tsx

/**
 * YouTube Video CLI - Details, comments and transcripts for any video
 */

import { describeApiError, friendlyApiError, isApiError } from "../../../scripts/lib/api-errors.js";
import { CREDENTIALS_PATH } from "../../../scripts/lib/config.js";
import {
  output,
  fail,
  intFlag,
  parseArgs,
  report,
  reportApiError,
} from "../../../scripts/lib/output.js";
import { describeUnavailable, renderSegments } from "../../../scripts/lib/reports/transcripts.js";
import {
  renderComments,
  renderSegmentMatches,
  renderTranscriptHeader,
  renderVideoDetails,
} from "../../../scripts/lib/reports/video.js";
import { searchSegments } from "../../../scripts/lib/transcripts/search.js";
import { createDefaultTranscriptFetcher } from "../../../scripts/lib/transcripts/youtube-transcript-source.js";
import { getVideo, getYouTubeClient, listComments } from "../../../scripts/lib/youtube-api.js";

function printUsage(): void {
  console.log(`
YouTube Video CLI

COMMANDS:
  details <videoId>       Full video details
  comments <videoId>      Top comments by relevance
    --max=N               Max comments (default: 10)
  transcript <videoId>    Video transcript (no auth required)
    --timed               Include timestamps
    --search=PHRASE       Only segments matching a keyword or phrase
    --context=N           Surrounding segments per match (default: 1)

OPTIONS:
  --json                  Print a JSON result instead of text

EXAMPLES:
  npx tsx skills/youtube/scripts/youtube-video.ts details dQw4w9WgXcQ
  npx tsx skills/youtube/scripts/youtube-video.ts comments dQw4w9WgXcQ --max=20
  npx tsx skills/youtube/scripts/youtube-video.ts transcript dQw4w9WgXcQ --search="never gonna"

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
      case "details": {
        const videoId = positional[0];
        if (!videoId) fail("Video ID required. Usage: youtube-video.ts details <videoId>");
        const youtube = await getYouTubeClient();
        const video = await getVideo(youtube, videoId);
        if (!video) {
          reportApiError(flags, `Video not found: ${videoId}`);
          break;
        }
        report(flags, renderVideoDetails(video), video);
        break;
      }

      case "comments": {
        const videoId = positional[0];
        if (!videoId) fail("Video ID required. Usage: youtube-video.ts comments <videoId>");
        const youtube = await getYouTubeClient();
        try {
          const comments = await listComments(youtube, videoId, intFlag(flags, "max", 10));
          report(flags, renderComments(comments), { comments, count: comments.length });
        } catch (err) {
          if (describeApiError(err).reason !== "commentsDisabled") throw err;
          reportApiError(flags, "Comments are disabled on this video.");
        }
        break;
      }

      case "transcript": {
        const videoId = positional[0];
        if (!videoId) fail("Video ID required. Usage: youtube-video.ts transcript <videoId>");
        const result = await createDefaultTranscriptFetcher().fetch(videoId);
        if (result.status === "unavailable") {
          reportApiError(flags, describeUnavailable(result.reason, result.message));
          break;
        }

        const header = renderTranscriptHeader(videoId, result.language);
        if (flags.search) {
          const context = flags.context ? Math.max(0, parseInt(flags.context, 10) || 0) : 1;
          const matches = searchSegments(result.segments, flags.search, context);
          report(flags, [...header, ...renderSegmentMatches(videoId, matches, flags.search)], {
            videoId,
            language: result.language,
            query: flags.search,
            matches,
          });
        } else {
          report(flags, [...header, ...renderSegments(result.segments, "timed" in flags)], {
            videoId,
            language: result.language,
            segments: result.segments,
            segmentCount: result.segments.length,
          });
        }
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
