/**
 * Report formatting: numbers, durations and fixed-width columns.
 * Everything here is pure; callers decide where the lines go.
 */

const integerFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const currencyFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 1234567 → "1,234,567" (fractions truncated) */
export function formatNumber(value: number): string {
  return integerFormat.format(Math.trunc(value));
}

/** Always carries a sign: "+1,234", "-56", "+0" */
export function formatSigned(value: number): string {
  const whole = Math.trunc(value);
  return whole < 0 ? `-${formatNumber(-whole)}` : `+${formatNumber(whole)}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatCurrency(value: number): string {
  return `$${currencyFormat.format(value)}`;
}

/**
 * Watch time in minutes to a readable span: "45.0 min", "1.5 hrs", "1.4 days".
 */
export function formatDuration(minutes: number): string {
  if (minutes < 60) {
    return `${minutes.toFixed(1)} min`;
  }
  const hours = minutes / 60;
  if (hours < 24) {
    return `${hours.toFixed(1)} hrs`;
  }
  return `${(hours / 24).toFixed(1)} days`;
}

/**
 * Seconds to "M:SS", or "H:MM:SS" once there are hours.
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const ss = String(s).padStart(2, "0");
  if (h) {
    return `${h}:${String(m).padStart(2, "0")}:${ss}`;
  }
  return `${m}:${ss}`;
}

/**
 * ISO 8601 video duration ("PT1H2M3S") to a timestamp ("1:02:03").
 * Anything that doesn't parse is returned as-is.
 */
export function formatIsoDuration(duration: string): string {
  const match = duration.match(/^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/);
  if (!match) {
    return duration;
  }
  const [, h = "0", m = "0", s = "0"] = match;
  return formatTimestamp(parseInt(h, 10) * 3600 + parseInt(m, 10) * 60 + parseInt(s, 10));
}

/** YYYY-MM-DD prefix of an RFC 3339 timestamp */
export function formatDate(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function ellipsize(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

// ============================================================================
// Columns
// ============================================================================

export interface Column {
  header: string;
  width: number;
  align?: "left" | "right";
}

function fit(text: string, column: Column): string {
  return column.align === "right" ? text.padStart(column.width) : text.padEnd(column.width);
}

export function renderRow(columns: Column[], cells: string[]): string {
  return columns
    .map((column, i) => fit(cells[i] ?? "", column))
    .join(" ")
    .trimEnd();
}

/**
 * Header, dash rule and one line per row. Cells wider than their column are
 * left intact so no data is lost; the caller truncates where it matters.
 */
export function renderTable(columns: Column[], rows: string[][], ruleWidth?: number): string[] {
  const width =
    ruleWidth ?? columns.reduce((sum, c) => sum + c.width, 0) + columns.length - 1;
  return [
    renderRow(
      columns,
      columns.map((c) => c.header)
    ),
    "-".repeat(width),
    ...rows.map((row) => renderRow(columns, row)),
  ];
}

/** "Label:" padded to a fixed width, then the value right-aligned */
export function labelled(label: string, value: string, labelWidth = 17, valueWidth = 12): string {
  return `${`${label}:`.padEnd(labelWidth)}${value.padStart(valueWidth)}`;
}

export function heading(title: string, width = 50): string[] {
  return [title, "=".repeat(width), ""];
}

// ============================================================================
// Text cleanup
// ============================================================================

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

/**
 * Comment `textDisplay` is HTML; turn it into plain terminal text.
 */
export function cleanCommentText(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

// ============================================================================
// Analytics labels
// ============================================================================

export const TRAFFIC_SOURCE_NAMES: Record<string, string> = {
  YT_SEARCH: "YouTube Search",
  EXT_URL: "External Websites",
  RELATED_VIDEO: "Suggested Videos",
  YT_CHANNEL: "Channel Pages",
  YT_OTHER_PAGE: "Other YouTube",
  SUBSCRIBER: "Subscriptions",
  NOTIFICATION: "Notifications",
  PLAYLIST: "Playlists",
  NO_LINK_OTHER: "Direct/Unknown",
  END_SCREEN: "End Screens",
  ANNOTATION: "Cards",
  SHORTS: "Shorts Feed",
  YT_PLAYLIST_PAGE: "Playlist Page",
  HASHTAGS: "Hashtags",
};

export const AGE_GROUPS: ReadonlyArray<{ id: string; label: string }> = [
  { id: "age13-17", label: "13-17" },
  { id: "age18-24", label: "18-24" },
  { id: "age25-34", label: "25-34" },
  { id: "age35-44", label: "35-44" },
  { id: "age45-54", label: "45-54" },
  { id: "age55-64", label: "55-64" },
  { id: "age65-", label: "65+" },
];
