import path from "node:path";
import {
  findLatestSeriesFile,
  loadSeriesFile,
} from "../core/series-serializer";
import { type SeriesSummary, summarizeSeries } from "../core/summary";
import { type TrendReport, computeTrend } from "../core/trend";
import type { Series } from "../core/types";
import type { ProjectConfig } from "../project/config";

export interface SeriesReport {
  file: string;
  series: Series;
  summary: SeriesSummary | null;
  trend: TrendReport;
}

/**
 * Summary and trend for a CSV written by an earlier run: the given file, or
 * the newest one in the configured output directory.
 */
export const loadSeriesReport = (input: {
  cwd: string;
  config: ProjectConfig;
  file?: string;
}): SeriesReport | null => {
  const file = input.file
    ? path.resolve(input.cwd, input.file)
    : findLatestSeriesFile(path.resolve(input.cwd, input.config.outputDir));
  if (!file) {
    return null;
  }

  const series = loadSeriesFile(file);
  return {
    file,
    series,
    summary: summarizeSeries(series),
    trend: computeTrend(series),
  };
};
