import { formatDate } from "./dates";
import type { Series } from "./types";

export interface TrendPoint {
  date: string;
  total: number;
  /** Net change from the previous bucket; 0 for the first. */
  change: number;
  movingAverage: number | null;
}

export interface TrendReport {
  points: TrendPoint[];
  window: number;
  peakTotal: number;
  averageChange: number;
}

/**
 * Net change per bucket plus a centered moving average of the total. The
 * average is null wherever the window does not fit inside the series.
 */
export const computeTrend = (series: Series, window = 7): TrendReport => {
  const size = Math.max(1, Math.floor(window));
  const before = Math.floor((size - 1) / 2);
  const after = size - 1 - before;
  const totals = series.map((snapshot) => snapshot.total);

  const points = series.map((snapshot, index): TrendPoint => {
    const previous = index > 0 ? totals[index - 1] : undefined;
    const from = index - before;
    const to = index + after;
    const movingAverage =
      from >= 0 && to < totals.length
        ? totals.slice(from, to + 1).reduce((sum, value) => sum + value, 0) /
          size
        : null;

    return {
      date: formatDate(snapshot.date),
      total: snapshot.total,
      change: previous === undefined ? 0 : snapshot.total - previous,
      movingAverage,
    };
  });

  const changes = points.slice(1).map((point) => point.change);
  return {
    points,
    window: size,
    peakTotal: totals.reduce((max, value) => Math.max(max, value), 0),
    averageChange:
      changes.length > 0
        ? changes.reduce((sum, value) => sum + value, 0) / changes.length
        : 0,
  };
};
