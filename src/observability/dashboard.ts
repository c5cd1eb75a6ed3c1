import { formatDate } from "../core/dates";
import { statusColumns } from "../core/series-serializer";
import type { SeriesSummary } from "../core/summary";
import type { TrendReport } from "../core/trend";
import type { Series } from "../core/types";
import type { ReadinessReport } from "../project/readiness";
import type { CfdRunResult } from "../runtime/cfd-run";

export type DashboardSection = "summary" | "series" | "trend" | "statuses";

export const DASHBOARD_SECTIONS: readonly DashboardSection[] = [
  "summary",
  "series",
  "trend",
  "statuses",
];

const formatPercentage = (value: number): string => `${value.toFixed(1)}%`;

const formatAverage = (value: number | null): string =>
  value === null ? "-" : value.toFixed(1);

export const buildSummaryLines = (summary: SeriesSummary | null): string[] => {
  if (!summary) {
    return ["No CFD data points"];
  }

  return [
    `Date range: ${summary.startDate} to ${summary.endDate}`,
    `Data points: ${summary.snapshotCount}`,
    `Start: ${summary.startTotal} stories`,
    `End: ${summary.endTotal} stories`,
    `Growth: ${summary.growth} stories`,
    "Current status distribution:",
    ...(summary.distribution.length > 0
      ? summary.distribution.map(
          (share) =>
            `- ${share.status}: ${share.count} (${formatPercentage(share.percentage)})`,
        )
      : ["- none"]),
  ];
};

export const buildRunLines = (result: CfdRunResult): string[] => [
  `project=${result.project.slug} (ID: ${result.project.id})`,
  `run=${result.runId}`,
  `window=${result.window.label} (${formatDate(result.window.start)}..${formatDate(result.window.end)})`,
  `granularity=${result.granularity}`,
  `statuses=${result.statusCount}`,
  `stories=${result.storiesInWindow}/${result.storiesFetched} pages=${result.pages}${result.truncated ? " (truncated)" : ""}`,
  result.write.ok
    ? `file=${result.write.file} rows=${result.write.rows}`
    : `write failed: ${result.write.file}: ${result.write.error}`,
  ...result.warnings.map((warning) => `warning: ${warning}`),
];

export const buildReadinessLines = (report: ReadinessReport): string[] => [
  `ready=${report.ready}`,
  `project=${report.summary.project}`,
  `user=${report.summary.user}`,
  `granularity=${report.summary.granularity}`,
  `max_stories=${report.summary.maxStories}`,
  ...report.reasons.map((reason) => `- ${reason}`),
];

export const buildCommandHelpLines = (): string[] => [
  "/cfd status",
  "/cfd generate [preset|YYYY-MM-DD [YYYY-MM-DD]] [daily|weekly|monthly]",
  "/cfd summary [csvFile]",
  "/cfd dashboard [summary|series|trend|statuses] [page] [csvFile]",
  "/cfd project",
  "/cfd bootstrap [force]",
  "/cfd readiness",
  "/cfd help",
  "presets: last-1-month, last-3-months, last-6-months, last-12-months, year-to-date",
];

const renderSection = (title: string, lines: string[]): string[] => [
  `=== ${title} ===`,
  ...(lines.length > 0 ? lines : ["(empty)"]),
];

const renderTable = (headers: string[], rows: string[][]): string[] => {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const formatRow = (values: string[]): string =>
    values.map((value, index) => value.padEnd(widths[index] ?? 0)).join(" | ");

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...rows.map((row) => formatRow(row)),
  ];
};

const paginate = <T>(items: readonly T[], page: number, pageSize: number): T[] => {
  const current = Math.max(1, page);
  const offset = (current - 1) * pageSize;
  return items.slice(offset, offset + pageSize);
};

export const buildTrendLines = (trend: TrendReport): string[] => [
  `peak_total=${trend.peakTotal}`,
  `average_change=${trend.averageChange.toFixed(2)}`,
  `moving_average_window=${trend.window}`,
];

export const buildInteractiveDashboardLines = (input: {
  section: DashboardSection;
  page: number;
  pageSize: number;
  series: Series;
  summary: SeriesSummary | null;
  trend: TrendReport;
  source?: string;
}): string[] => {
  const page = Math.max(1, input.page);
  const pageSize = Math.max(1, input.pageSize);
  const header = renderSection("dashboard", [
    `section=${input.section}`,
    `page=${page}`,
    `page_size=${pageSize}`,
    ...(input.source ? [`source=${input.source}`] : []),
  ]);

  if (input.section === "summary") {
    return [...header, ...renderSection("summary", buildSummaryLines(input.summary))];
  }

  if (input.section === "series") {
    const statuses = statusColumns(input.series);
    const rows = paginate(input.series, page, pageSize).map((snapshot) => [
      formatDate(snapshot.date),
      `${snapshot.total}`,
      ...statuses.map((name) =>
        Object.hasOwn(snapshot.counts, name)
          ? `${snapshot.counts[name] ?? 0}`
          : "0",
      ),
    ]);

    return [
      ...header,
      ...renderTable(["date", "total", ...statuses], rows),
    ];
  }

  if (input.section === "trend") {
    const rows = paginate(input.trend.points, page, pageSize).map((point) => [
      point.date,
      `${point.total}`,
      point.change > 0 ? `+${point.change}` : `${point.change}`,
      formatAverage(point.movingAverage),
    ]);

    return [
      ...header,
      ...renderSection("trend", buildTrendLines(input.trend)),
      ...renderTable(["date", "total", "change", "moving_avg"], rows),
    ];
  }

  const shares = input.summary?.distribution ?? [];
  const rows = paginate(shares, page, pageSize).map((share) => [
    share.status,
    `${share.count}`,
    formatPercentage(share.percentage),
  ]);

  return [
    ...header,
    ...renderTable(["status", "count", "share"], rows),
  ];
};
