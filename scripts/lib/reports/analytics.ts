import type {
  ChannelOverview,
  CountryViews,
  DateRange,
  DemographicShare,
  TrafficSource,
  VideoPerformance,
  VideoStats,
} from "../analytics.js";
import {
  AGE_GROUPS,
  TRAFFIC_SOURCE_NAMES,
  formatCurrency,
  formatDuration,
  formatNumber,
  formatPercent,
  formatSigned,
  heading,
  labelled,
  renderTable,
  truncate,
} from "../format.js";

export function renderOverview(overview: ChannelOverview, range: DateRange): string[] {
  const net = overview.subscribersGained - overview.subscribersLost;
  const lines = [
    ...heading(`Channel Overview (${range.days} days: ${range.startDate} to ${range.endDate})`),
    labelled("Views", formatNumber(overview.views)),
    labelled("Watch Time", formatDuration(overview.watchMinutes)),
    `${labelled("Subscribers", formatSigned(net))} (${formatNumber(overview.subscribersGained)} gained, ${formatNumber(overview.subscribersLost)} lost)`,
    "",
    labelled("Likes", formatNumber(overview.likes)),
    labelled("Comments", formatNumber(overview.comments)),
    labelled("Shares", formatNumber(overview.shares)),
  ];
  if (overview.revenue > 0) {
    lines.push("", labelled("Est. Revenue", formatCurrency(overview.revenue)));
  }
  return lines;
}

export function renderTopVideos(
  videos: VideoPerformance[],
  titles: Map<string, string>,
  range: DateRange,
  max: number
): string[] {
  const rows = videos.map((v) => [
    truncate(titles.get(v.videoId) ?? v.videoId, 43),
    formatNumber(v.views),
    formatDuration(v.watchMinutes),
    v.revenue > 0 ? formatCurrency(v.revenue) : "-",
  ]);
  return [
    ...heading(`Top ${max} Videos (${range.days} days)`, 80),
    ...renderTable(
      [
        { header: "Title", width: 45 },
        { header: "Views", width: 10, align: "right" },
        { header: "Watch Time", width: 12, align: "right" },
        { header: "Revenue", width: 10, align: "right" },
      ],
      rows,
      80
    ),
  ];
}

export function renderVideoStats(
  stats: VideoStats,
  videoId: string,
  title: string,
  range: DateRange
): string[] {
  const row = (label: string, value: string) => labelled(label, value, 18);
  const lines = [
    `Video: ${title}`,
    `ID: ${videoId}`,
    `Period: ${range.startDate} to ${range.endDate} (${range.days} days)`,
    "=".repeat(50),
    "",
    row("Views", formatNumber(stats.views)),
    row("Watch Time", formatDuration(stats.watchMinutes)),
    row("Avg View Duration", `${Math.trunc(stats.averageViewDuration)}s`),
    "",
    row("Subscribers", formatSigned(stats.subscribersGained)),
    row("Likes", formatNumber(stats.likes)),
    row("Comments", formatNumber(stats.comments)),
    row("Shares", formatNumber(stats.shares)),
  ];
  if (stats.revenue > 0) {
    lines.push("", row("Est. Revenue", formatCurrency(stats.revenue)));
  }
  return lines;
}

export function renderDemographics(shares: DemographicShare[], range: DateRange): string[] {
  const male = new Map<string, number>();
  const female = new Map<string, number>();
  for (const share of shares) {
    (share.gender === "male" ? male : female).set(share.ageGroup, share.percentage);
  }

  const rows = AGE_GROUPS.map(({ id, label }) => [
    label,
    formatPercent(male.get(id) ?? 0),
    formatPercent(female.get(id) ?? 0),
  ]);

  return [
    ...heading(`Viewer Demographics (${range.days} days)`, 40),
    ...renderTable(
      [
        { header: "Age", width: 10 },
        { header: "Male", width: 10, align: "right" },
        { header: "Female", width: 10, align: "right" },
      ],
      rows,
      30
    ),
  ];
}

export function renderTraffic(sources: TrafficSource[], range: DateRange): string[] {
  const total = sources.reduce((sum, s) => sum + s.views, 0);
  const rows = sources.map((s) => [
    TRAFFIC_SOURCE_NAMES[s.source] ?? s.source,
    formatNumber(s.views),
    formatPercent(total > 0 ? (s.views / total) * 100 : 0),
  ]);

  return [
    ...heading(`Traffic Sources (${range.days} days)`),
    ...renderTable(
      [
        { header: "Source", width: 35 },
        { header: "Views", width: 10, align: "right" },
        { header: "%", width: 8, align: "right" },
      ],
      rows,
      55
    ),
  ];
}

export function renderGeography(countries: CountryViews[], range: DateRange): string[] {
  const rows = countries.map((c) => [
    c.country,
    formatNumber(c.views),
    formatDuration(c.watchMinutes),
  ]);

  return [
    ...heading(`Top Countries (${range.days} days)`),
    ...renderTable(
      [
        { header: "Country", width: 25 },
        { header: "Views", width: 12, align: "right" },
        { header: "Watch Time", width: 12, align: "right" },
      ],
      rows,
      50
    ),
  ];
}
