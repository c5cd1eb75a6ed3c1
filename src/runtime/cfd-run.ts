import path from "node:path";
import { customAlphabet } from "nanoid";
import {
  type DateRangePreset,
  type ResolvedDateWindow,
  resolveDateWindow,
} from "../core/date-window";
import { normalizeInstant, parseGranularity } from "../core/dates";
import { buildSeries } from "../core/series-builder";
import {
  type SeriesWriteResult,
  buildSeriesFileName,
  writeSeriesFile,
} from "../core/series-serializer";
import { type SeriesSummary, summarizeSeries } from "../core/summary";
import {
  type Granularity,
  type RunId,
  type Series,
  type StoryRecord,
  asRunId,
  createStatusCatalog,
} from "../core/types";
import type { ProjectConfig } from "../project/config";
import type { TaigaClient } from "../taiga/client";

const nextRunId = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 8);

export type CfdDataSource = Pick<
  TaigaClient,
  "projectBySlug" | "listStatuses" | "listStories"
>;

export interface CfdRunRequest {
  preset?: DateRangePreset;
  start?: string;
  end?: string;
  granularity?: string;
}

export interface CfdRunInput {
  cwd: string;
  config: ProjectConfig;
  source: CfdDataSource;
  request?: CfdRunRequest;
  now?: Date;
  runId?: RunId;
  onWarning?: (message: string) => void;
  onProgress?: (message: string) => void;
}

export interface CfdRunResult {
  runId: RunId;
  project: { id: number; name: string; slug: string };
  window: ResolvedDateWindow;
  granularity: Granularity;
  statusCount: number;
  storiesFetched: number;
  storiesInWindow: number;
  pages: number;
  truncated: boolean;
  series: Series;
  write: SeriesWriteResult;
  summary: SeriesSummary | null;
  warnings: string[];
}

const createdOnOrAfter = (story: StoryRecord, start: Date): boolean => {
  const created = normalizeInstant(story.created_at);
  // Unparseable dates are left for the builder to skip and report.
  return !created.ok || created.instant.getTime() >= start.getTime();
};

/**
 * One end-to-end generation: statuses and stories from Taiga, the bucket
 * series, the CSV file and its summary. Everything the run depends on is
 * passed in; nothing is cached between runs.
 */
export const runCfdGeneration = async (
  input: CfdRunInput,
): Promise<CfdRunResult> => {
  const { config } = input;
  if (!config.projectSlug || config.projectId <= 0) {
    throw new Error(
      "Project is not configured: set projectSlug and projectId in .cfd/project.ts or TAIGA_PROJECT_SLUG/TAIGA_PROJECT_ID",
    );
  }

  const warnings: string[] = [];
  const warn = (message: string) => {
    warnings.push(message);
    input.onWarning?.(message);
  };
  const progress = (message: string) => input.onProgress?.(message);
  const now = input.now ?? new Date();
  const request = input.request ?? {};
  const runId = input.runId ?? asRunId(nextRunId());

  const granularity = parseGranularity(
    request.granularity ?? config.granularity,
    warn,
  );
  const window = resolveDateWindow(
    {
      now,
      monthsBack: config.monthsBack,
      ...(request.preset ? { preset: request.preset } : {}),
      ...(request.start !== undefined ? { start: request.start } : {}),
      ...(request.end !== undefined ? { end: request.end } : {}),
    },
    warn,
  );

  progress(`Verifying access to project ${config.projectSlug}`);
  const project = await input.source.projectBySlug(config.projectSlug);
  if (project.id !== config.projectId) {
    warn(
      `Configured project id ${config.projectId} does not match ${config.projectSlug} (ID: ${project.id}); using ${project.id}`,
    );
  }

  progress(`Fetching user story statuses for project ${project.id}`);
  const statuses = await input.source.listStatuses(project.id);
  if (statuses.length === 0) {
    warn("No user story statuses found; stories will be labelled by status id");
  }

  progress(`Fetching user stories for project ${project.id}`);
  const listing = await input.source.listStories(project.id, {
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    onPage: (event) =>
      progress(`Fetched page ${event.page} (${event.received} stories)`),
  });
  if (listing.truncated) {
    warn(
      `Stopped after ${listing.pages} pages (maxPages=${config.maxPages}); later stories are missing`,
    );
  }
  if (listing.skipped > 0) {
    warn(`Ignored ${listing.skipped} malformed story records from the API`);
  }

  const stories = config.includeStoriesBeforeWindow
    ? listing.stories
    : listing.stories.filter((story) => createdOnOrAfter(story, window.start));

  progress(`Generating ${granularity} CFD data for ${window.label}`);
  const series = buildSeries({
    stories,
    catalog: createStatusCatalog(statuses),
    window,
    granularity,
    onWarning: warn,
  });

  const file = path.resolve(
    input.cwd,
    config.outputDir,
    buildSeriesFileName({
      projectSlug: config.projectSlug,
      granularity,
      now,
      runId,
    }),
  );
  const write = writeSeriesFile(series, file);
  if (write.ok) {
    progress(`CFD data saved to ${write.file}`);
  }

  return {
    runId,
    project: { id: project.id, name: project.name, slug: project.slug },
    window,
    granularity,
    statusCount: statuses.length,
    storiesFetched: listing.stories.length,
    storiesInWindow: stories.length,
    pages: listing.pages,
    truncated: listing.truncated,
    series,
    write,
    summary: summarizeSeries(series),
    warnings,
  };
};
