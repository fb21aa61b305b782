import { afterEach, describe, expect, it, vi } from "vitest";
import { createDefaultTranscriptFetcher } from "./youtube-transcript-source.js";

const VIDEO_ID = "abcdefghijk";

interface Track {
  languageCode: string;
  baseUrl: string;
}

interface Fixture {
  /** Tracks the player reports; none means captions are off */
  tracks: Track[];
  /** Caption body per track URL; a missing entry answers 404 */
  bodies?: Record<string, string>;
  /** Overrides the watch page HTML */
  watchPage?: string;
  innertubeStatus?: number;
}

function trackUrl(lang: string): string {
  return `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=${lang}`;
}

function playerResponse(tracks: Track[]) {
  return {
    playabilityStatus: { status: "OK" },
    ...(tracks.length > 0 && { captions: { playerCaptionsTracklistRenderer: { captionTracks: tracks } } }),
  };
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.href : input.url;
}

function stubYouTube(fixture: Fixture) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = requestUrl(input);
    if (url.startsWith("https://www.youtube.com/youtubei/v1/player")) {
      return new Response(JSON.stringify(playerResponse(fixture.tracks)), {
        status: fixture.innertubeStatus ?? 200,
      });
    }
    if (url.startsWith("https://www.youtube.com/watch")) {
      const html =
        fixture.watchPage ??
        `<html><script>var ytInitialPlayerResponse = ${JSON.stringify(playerResponse(fixture.tracks))};</script></html>`;
      return new Response(html);
    }
    const body = fixture.bodies?.[url];
    return body === undefined ? new Response("", { status: 404 }) : new Response(body);
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("youtube-transcript caption source", () => {
  it("converts srv3 millisecond timings to seconds", async () => {
    stubYouTube({
      tracks: [{ languageCode: "en", baseUrl: trackUrl("en") }],
      bodies: {
        [trackUrl("en")]:
          '<timedtext format="3"><body><p t="42000" d="2000">hello world</p>' +
          '<p t="3661500" d="1500">an hour in</p></body></timedtext>',
      },
    });

    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);

    expect(result).toEqual({
      status: "ok",
      language: "en",
      segments: [
        { start: 42, text: "hello world" },
        { start: 3661, text: "an hour in" },
      ],
    });
  });

  it("keeps the older text format in seconds", async () => {
    stubYouTube({
      tracks: [{ languageCode: "en", baseUrl: trackUrl("en") }],
      bodies: {
        [trackUrl("en")]:
          '<transcript><text start="42.5" dur="1.2">first line</text>' +
          '<text start="61.9" dur="2">second line</text></transcript>',
      },
    });

    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);

    expect(result).toEqual({
      status: "ok",
      language: "en",
      segments: [
        { start: 42, text: "first line" },
        { start: 61, text: "second line" },
      ],
    });
  });

  it("leaves text as the library decoded it", async () => {
    stubYouTube({
      tracks: [{ languageCode: "en", baseUrl: trackUrl("en") }],
      bodies: {
        [trackUrl("en")]: '<transcript><text start="1" dur="1">Q&amp;amp;A it&#39;s</text></transcript>',
      },
    });

    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);

    expect(result).toEqual({
      status: "ok",
      language: "en",
      segments: [{ start: 1, text: "Q&amp;A it's" }],
    });
  });

  it("falls back to the first track when no English one exists", async () => {
    stubYouTube({
      tracks: [{ languageCode: "de", baseUrl: trackUrl("de") }],
      bodies: { [trackUrl("de")]: '<p t="5000" d="1000">hallo</p>' },
    });

    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);

    expect(result).toEqual({ status: "ok", language: "de", segments: [{ start: 5, text: "hallo" }] });
  });

  it("reports captions turned off as disabled", async () => {
    stubYouTube({ tracks: [] });
    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);
    expect(result).toMatchObject({ status: "unavailable", reason: "disabled" });
  });

  it("reports an unreachable track as not found", async () => {
    stubYouTube({ tracks: [{ languageCode: "en", baseUrl: trackUrl("en") }] });
    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);
    expect(result).toMatchObject({ status: "unavailable", reason: "not-found" });
  });

  it("reports a missing video as unavailable", async () => {
    const fetchMock = stubYouTube({ tracks: [], innertubeStatus: 500, watchPage: "<html>gone</html>" });

    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);

    expect(result).toMatchObject({ status: "unavailable", reason: "video-unavailable" });
    // no further languages are tried after a failure other than a missing track
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports a captcha page as rate limited", async () => {
    stubYouTube({
      tracks: [],
      innertubeStatus: 429,
      watchPage: '<html><div class="g-recaptcha"></div></html>',
    });
    const result = await createDefaultTranscriptFetcher().fetch(VIDEO_ID);
    expect(result).toMatchObject({ status: "unavailable", reason: "rate-limited" });
  });
});
