import { describe, expect, it, vi } from "vitest";
import {
  getDateRange,
  getDemographics,
  getOverview,
  getTopVideos,
  getTrafficSources,
  type DateRange,
  type ReportRow,
} from "./analytics.js";
import { labelled } from "./format.js";
import { renderDemographics, renderOverview, renderTraffic } from "./reports/analytics.js";

const RANGE: DateRange = { startDate: "2024-02-15", endDate: "2024-03-14", days: 28 };

function queryReturning(rows: ReportRow[]) {
  return vi.fn(async () => rows);
}

describe("getDateRange", () => {
  it("ends yesterday and spans the requested days", () => {
    expect(getDateRange(28, new Date(2024, 2, 15, 12))).toEqual(RANGE);
  });

  it("crosses a year boundary", () => {
    expect(getDateRange(7, new Date(2024, 0, 3, 12))).toEqual({
      startDate: "2023-12-26",
      endDate: "2024-01-02",
      days: 7,
    });
  });
});

describe("report queries", () => {
  it("maps the overview row to named metrics", async () => {
    const query = queryReturning([[1000, 90, 10, 2, 50, 5, 3, 12.5]]);

    const overview = await getOverview(query, "UC123", RANGE);

    expect(overview).toEqual({
      views: 1000,
      watchMinutes: 90,
      subscribersGained: 10,
      subscribersLost: 2,
      likes: 50,
      comments: 5,
      shares: 3,
      revenue: 12.5,
    });
    expect(query).toHaveBeenCalledWith("UC123", RANGE, {
      metrics: [
        "views",
        "estimatedMinutesWatched",
        "subscribersGained",
        "subscribersLost",
        "likes",
        "comments",
        "shares",
        "estimatedRevenue",
      ],
    });
  });

  it("returns null for an empty overview", async () => {
    expect(await getOverview(queryReturning([]), "UC123", RANGE)).toBeNull();
  });

  it("asks for top videos sorted by views", async () => {
    const query = queryReturning([["vid1", 500, 120, 0]]);

    const videos = await getTopVideos(query, "UC123", RANGE, 5);

    expect(videos).toEqual([{ videoId: "vid1", views: 500, watchMinutes: 120, revenue: 0 }]);
    expect(query).toHaveBeenCalledWith("UC123", RANGE, {
      metrics: ["views", "estimatedMinutesWatched", "estimatedRevenue"],
      dimensions: ["video"],
      sort: "-views",
      maxResults: 5,
    });
  });

  it("parses numeric strings in report cells", async () => {
    const shares = await getDemographics(queryReturning([["age18-24", "female", "12.5"]]), "UC123", RANGE);
    expect(shares).toEqual([{ ageGroup: "age18-24", gender: "female", percentage: 12.5 }]);
  });

  it("reads traffic sources", async () => {
    const sources = await getTrafficSources(queryReturning([["YT_SEARCH", 300]]), "UC123", RANGE);
    expect(sources).toEqual([{ source: "YT_SEARCH", views: 300 }]);
  });
});

describe("renderOverview", () => {
  const overview = {
    views: 1000,
    watchMinutes: 90,
    subscribersGained: 10,
    subscribersLost: 2,
    likes: 50,
    comments: 5,
    shares: 3,
    revenue: 0,
  };

  it("prints the period and net subscribers", () => {
    const lines = renderOverview(overview, RANGE);
    expect(lines.slice(0, 6)).toEqual([
      "Channel Overview (28 days: 2024-02-15 to 2024-03-14)",
      "=".repeat(50),
      "",
      labelled("Views", "1,000"),
      labelled("Watch Time", "1.5 hrs"),
      `${labelled("Subscribers", "+8")} (10 gained, 2 lost)`,
    ]);
    expect(lines).not.toContain(labelled("Est. Revenue", "$0.00"));
  });

  it("adds revenue when there is some", () => {
    const lines = renderOverview({ ...overview, revenue: 12.5 }, RANGE);
    expect(lines.slice(-2)).toEqual(["", labelled("Est. Revenue", "$12.50")]);
  });
});

describe("renderTraffic", () => {
  it("names sources and shows each share of the total", () => {
    const lines = renderTraffic(
      [
        { source: "YT_SEARCH", views: 300 },
        { source: "EXT_URL", views: 100 },
      ],
      RANGE
    );
    expect(lines.slice(3)).toEqual([
      `${"Source".padEnd(35)} ${"Views".padStart(10)} ${"%".padStart(8)}`,
      "-".repeat(55),
      `${"YouTube Search".padEnd(35)} ${"300".padStart(10)} ${"75.0%".padStart(8)}`,
      `${"External Websites".padEnd(35)} ${"100".padStart(10)} ${"25.0%".padStart(8)}`,
    ]);
  });
});

describe("renderDemographics", () => {
  it("lists every age group with male and female shares", () => {
    const lines = renderDemographics(
      [
        { ageGroup: "age25-34", gender: "male", percentage: 40 },
        { ageGroup: "age25-34", gender: "female", percentage: 20 },
      ],
      RANGE
    );
    expect(lines[0]).toBe("Viewer Demographics (28 days)");
    expect(lines[4]).toBe("-".repeat(30));
    expect(lines).toHaveLength(3 + 2 + 7);
    expect(lines[5]).toBe(`${"13-17".padEnd(10)} ${"0.0%".padStart(10)} ${"0.0%".padStart(10)}`);
    expect(lines[7]).toBe(`${"25-34".padEnd(10)} ${"40.0%".padStart(10)} ${"20.0%".padStart(10)}`);
  });
});
