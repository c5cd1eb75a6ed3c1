import { describe, expect, it, vi } from "vitest";
import { DAY_MS, formatDate } from "../src/core/dates";
import { buildSeries } from "../src/core/series-builder";
import { serializeSeries } from "../src/core/series-serializer";
import {
  type StoryRecord,
  createStatusCatalog,
} from "../src/core/types";

const catalog = createStatusCatalog([
  { id: 1, name: "New" },
  { id: 2, name: "In progress" },
  { id: 3, name: "Done", is_closed: true },
]);

const utc = (value: string) => new Date(`${value}T00:00:00Z`);

const window = (start: string, end: string) => ({
  start: utc(start),
  end: utc(end),
});

describe("buildSeries", () => {
  it("counts stories that exist by each bucket under their current status", () => {
    const stories: StoryRecord[] = [
      { id: 1, created_at: "2025-01-01", status_id: 1 },
      { id: 2, created_at: "2025-01-03", status_id: 3 },
    ];

    const series = buildSeries({
      stories,
      catalog,
      window: window("2025-01-01", "2025-01-03"),
      granularity: "daily",
    });

    expect(
      series.map((snapshot) => ({
        date: formatDate(snapshot.date),
        total: snapshot.total,
        counts: snapshot.counts,
      })),
    ).toEqual([
      { date: "2025-01-01", total: 1, counts: { New: 1 } },
      { date: "2025-01-02", total: 1, counts: { New: 1 } },
      { date: "2025-01-03", total: 2, counts: { New: 1, Done: 1 } },
    ]);
  });

  it("reports today's status in buckets before the story moved", () => {
    const series = buildSeries({
      stories: [{ id: 1, created_at: "2025-01-01T00:00:00Z", status_id: 3 }],
      catalog,
      window: window("2025-01-01", "2025-01-02"),
      granularity: "daily",
    });

    expect(series[0]?.counts).toEqual({ Done: 1 });
    expect(series[1]?.counts).toEqual({ Done: 1 });
  });

  it("emits empty snapshots for every bucket when there are no stories", () => {
    const series = buildSeries({
      stories: [],
      catalog,
      window: window("2025-01-01", "2025-01-02"),
      granularity: "daily",
    });

    expect(series).toHaveLength(2);
    expect(series.map((snapshot) => [snapshot.total, snapshot.counts])).toEqual([
      [0, {}],
      [0, {}],
    ]);
  });

  it("labels unknown status ids with a placeholder and still counts them", () => {
    const series = buildSeries({
      stories: [
        { id: 1, created_at: "2025-01-01", status_id: 99 },
        { id: 2, created_at: "2025-01-01", status_id: 1 },
      ],
      catalog,
      window: window("2025-01-01", "2025-01-01"),
      granularity: "daily",
    });

    expect(series).toEqual([
      {
        date: utc("2025-01-01"),
        counts: { "Status 99": 1, New: 1 },
        total: 2,
      },
    ]);
  });

  it("skips stories with bad dates or no status and warns once", () => {
    const onWarning = vi.fn();
    const series = buildSeries({
      stories: [
        { id: 1, created_at: "not a date", status_id: 1 },
        { id: 2, created_at: null, status_id: 1 },
        { id: 3, created_at: "2025-01-01", status_id: null },
        { id: 4, created_at: "2025-01-01", status_id: 2 },
      ],
      catalog,
      window: window("2025-01-01", "2025-01-01"),
      granularity: "daily",
      onWarning,
    });

    expect(series[0]?.total).toBe(1);
    expect(series[0]?.counts).toEqual({ "In progress": 1 });
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith(
      "Skipped 3 stories with a missing or unparseable created date or status",
    );
  });

  it("produces floor(span / stride) + 1 buckets at a fixed stride", () => {
    const cases = [
      { granularity: "daily", end: "2025-01-31", expected: 31, stride: 1 },
      { granularity: "weekly", end: "2025-01-31", expected: 5, stride: 7 },
      { granularity: "monthly", end: "2025-07-01", expected: 7, stride: 30 },
    ] as const;

    for (const entry of cases) {
      const series = buildSeries({
        stories: [],
        catalog,
        window: window("2025-01-01", entry.end),
        granularity: entry.granularity,
      });

      expect(series).toHaveLength(entry.expected);
      for (let index = 1; index < series.length; index += 1) {
        const previous = series[index - 1]?.date.getTime() ?? 0;
        const current = series[index]?.date.getTime() ?? 0;
        expect(current - previous).toBe(entry.stride * DAY_MS);
      }
    }
  });

  it("treats start == end as a single bucket and start > end as empty", () => {
    const single = buildSeries({
      stories: [],
      catalog,
      window: window("2025-01-05", "2025-01-05"),
      granularity: "weekly",
    });
    expect(single).toHaveLength(1);

    const inverted = buildSeries({
      stories: [],
      catalog,
      window: window("2025-01-05", "2025-01-01"),
      granularity: "daily",
    });
    expect(inverted).toEqual([]);
  });

  it("falls back to daily buckets for an unknown granularity", () => {
    const onWarning = vi.fn();
    const series = buildSeries({
      stories: [],
      catalog,
      window: window("2025-01-01", "2025-01-03"),
      granularity: "fortnightly",
      onWarning,
    });

    expect(series).toHaveLength(3);
    expect(onWarning).toHaveBeenCalledWith(
      "Unknown granularity 'fortnightly', defaulting to daily",
    );
  });

  it("keeps total at least the sum of visible counts", () => {
    const stories: StoryRecord[] = Array.from({ length: 12 }, (_, index) => ({
      id: index,
      created_at: new Date(Date.UTC(2025, 0, 1 + index)).toISOString(),
      status_id: (index % 4) + 1,
    }));
    const series = buildSeries({
      stories,
      catalog,
      window: window("2025-01-01", "2025-01-14"),
      granularity: "daily",
    });

    for (const snapshot of series) {
      const visible = Object.values(snapshot.counts).reduce((a, b) => a + b, 0);
      expect(snapshot.total).toBeGreaterThanOrEqual(visible);
      expect(Object.values(snapshot.counts).every((count) => count > 0)).toBe(
        true,
      );
    }
    expect(series.at(-1)?.total).toBe(12);
  });

  it("is deterministic for identical inputs", () => {
    const input = {
      stories: [
        { id: 1, created_at: "2025-01-02T08:00:00+01:00", status_id: 2 },
        { id: 2, created_at: "2025-01-01", status_id: 1 },
      ],
      catalog,
      window: window("2025-01-01", "2025-01-10"),
      granularity: "daily",
    };

    expect(serializeSeries(buildSeries(input))).toBe(
      serializeSeries(buildSeries(input)),
    );
  });

  it("rejects inputs that are not story arrays or catalogs", () => {
    const notArray: StoryRecord[] = JSON.parse('{"stories":[]}');
    expect(() =>
      buildSeries({
        stories: notArray,
        catalog,
        window: window("2025-01-01", "2025-01-02"),
        granularity: "daily",
      }),
    ).toThrow("stories must be an array of story records");

    expect(() =>
      buildSeries({
        stories: [],
        catalog: JSON.parse("{}"),
        window: window("2025-01-01", "2025-01-02"),
        granularity: "daily",
      }),
    ).toThrow("status catalog must be a Map of status id to name");
  });
});
