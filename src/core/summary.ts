import { formatDate } from "./dates";
import type { Series } from "./types";

export interface StatusShare {
  status: string;
  count: number;
  /** Share of the latest total, 0 when that total is 0. */
  percentage: number;
}

export interface SeriesSummary {
  startDate: string;
  endDate: string;
  snapshotCount: number;
  startTotal: number;
  endTotal: number;
  growth: number;
  distribution: StatusShare[];
}

export const summarizeSeries = (series: Series): SeriesSummary | null => {
  const first = series[0];
  const last = series.at(-1);
  if (!first || !last) {
    return null;
  }

  const distribution = Object.entries(last.counts)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([status, count]) => ({
      status,
      count,
      percentage: last.total > 0 ? (count / last.total) * 100 : 0,
    }));

  return {
    startDate: formatDate(first.date),
    endDate: formatDate(last.date),
    snapshotCount: series.length,
    startTotal: first.total,
    endTotal: last.total,
    growth: last.total - first.total,
    distribution,
  };
};
