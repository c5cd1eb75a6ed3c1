import { normalizeInstant, parseGranularity, strideMs } from "./dates";
import {
  type BucketSnapshot,
  type DateWindow,
  type Granularity,
  type Series,
  type StatusCatalog,
  type StoryRecord,
  type WarningSink,
  statusName,
} from "./types";

export interface BuildSeriesInput {
  stories: readonly StoryRecord[];
  catalog: StatusCatalog;
  window: DateWindow;
  /** Unknown values fall back to daily with a warning. */
  granularity: Granularity | string;
  onWarning?: WarningSink;
}

interface DatedStory {
  createdMs: number;
  status: string;
}

export const bucketCount = (window: DateWindow, stride: number): number => {
  const span = window.end.getTime() - window.start.getTime();
  if (!Number.isFinite(span) || span < 0) {
    return 0;
  }
  return Math.floor(span / stride) + 1;
};

const prepareStories = (
  stories: readonly StoryRecord[],
  catalog: StatusCatalog,
): { dated: DatedStory[]; skipped: number } => {
  const dated: DatedStory[] = [];
  let skipped = 0;

  for (const story of stories) {
    const created = normalizeInstant(story.created_at);
    if (!created.ok || typeof story.status_id !== "number") {
      skipped += 1;
      continue;
    }

    dated.push({
      createdMs: created.instant.getTime(),
      status: statusName(catalog, story.status_id),
    });
  }

  dated.sort((a, b) => a.createdMs - b.createdMs);
  return { dated, skipped };
};

/**
 * Builds one snapshot per bucket from `window.start` to `window.end`
 * inclusive.
 *
 * Every story created on or before a bucket date is counted under its
 * *current* status, not the status it had on that date. Earlier buckets
 * therefore show today's distribution restricted to the stories that existed
 * then: in-progress stages are understated and terminal ones overstated.
 * Reconstructing real history would need the story history endpoint and is
 * not done here.
 */
export const buildSeries = (input: BuildSeriesInput): Series => {
  if (!Array.isArray(input.stories)) {
    throw new Error("stories must be an array of story records");
  }
  if (!(input.catalog instanceof Map)) {
    throw new Error("status catalog must be a Map of status id to name");
  }

  const granularity = parseGranularity(input.granularity, input.onWarning);
  const stride = strideMs(granularity);
  const buckets = bucketCount(input.window, stride);
  const { dated, skipped } = prepareStories(input.stories, input.catalog);

  if (skipped > 0) {
    input.onWarning?.(
      `Skipped ${skipped} ${skipped === 1 ? "story" : "stories"} with a missing or unparseable created date or status`,
    );
  }

  const running = new Map<string, number>();
  const series: BucketSnapshot[] = [];
  const startMs = input.window.start.getTime();
  let cursor = 0;
  let total = 0;

  for (let index = 0; index < buckets; index += 1) {
    const bucketMs = startMs + index * stride;

    while (cursor < dated.length) {
      const story = dated[cursor];
      if (!story || story.createdMs > bucketMs) {
        break;
      }
      running.set(story.status, (running.get(story.status) ?? 0) + 1);
      total += 1;
      cursor += 1;
    }

    series.push({
      date: new Date(bucketMs),
      counts: Object.fromEntries(
        [...running.entries()].filter(([, count]) => count > 0),
      ),
      total,
    });
  }

  return series;
};
