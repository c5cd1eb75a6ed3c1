import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { asRunId } from "../src/core/types";
import type { StatusEntry, StoryRecord } from "../src/core/types";
import { type ProjectConfig, defaultProjectConfig } from "../src/project/config";
import { type CfdDataSource, runCfdGeneration } from "../src/runtime/cfd-run";
import type { StoryListing } from "../src/taiga/client";

const statuses: StatusEntry[] = [
  { id: 1, name: "New" },
  { id: 3, name: "Done", is_closed: true },
];

const stories: StoryRecord[] = [
  { id: 1, created_at: "2025-01-01T00:00:00Z", status_id: 1 },
  { id: 2, created_at: "2025-01-02T12:00:00Z", status_id: 3 },
  { id: 3, created_at: "2024-12-15T09:00:00Z", status_id: 1 },
];

const fakeSource = (
  listing: Partial<StoryListing> = {},
): CfdDataSource & { requestedPages: number[] } => {
  const requestedPages: number[] = [];
  return {
    requestedPages,
    projectBySlug: async (slug) => ({ id: 12, name: "Team Board", slug }),
    listStatuses: async () => statuses,
    listStories: async (_projectId, options) => {
      requestedPages.push(options.maxPages);
      options.onPage?.({ page: 1, received: stories.length });
      return { stories, pages: 1, skipped: 0, truncated: false, ...listing };
    },
  };
};

const makeConfig = (overrides: Partial<ProjectConfig> = {}): ProjectConfig => ({
  ...defaultProjectConfig,
  projectSlug: "team-board",
  projectId: 12,
  outputDir: "reports",
  ...overrides,
});

const makeCwd = () => fs.mkdtempSync(path.join(os.tmpdir(), "cfd-run-"));

const request = { start: "2025-01-01", end: "2025-01-03", granularity: "daily" };

describe("runCfdGeneration", () => {
  it("fetches, builds, writes and summarizes one run", async () => {
    const cwd = makeCwd();
    const progress: string[] = [];

    const result = await runCfdGeneration({
      cwd,
      config: makeConfig(),
      source: fakeSource(),
      request,
      now: new Date("2025-01-03T00:00:00Z"),
      runId: asRunId("run00001"),
      onProgress: (message) => progress.push(message),
    });

    const file = path.join(
      cwd,
      "reports",
      "cfd_data_team-board_daily_20250103_000000_run00001.csv",
    );
    expect(result.write).toEqual({
      ok: true,
      file,
      rows: 3,
      columns: ["date", "total", "Done", "New"],
    });
    expect(fs.readFileSync(file, "utf8")).toBe(
      "date,total,Done,New\r\n" +
        "2025-01-01,1,0,1\r\n" +
        "2025-01-02,1,0,1\r\n" +
        "2025-01-03,2,1,1\r\n",
    );

    expect(result.project).toEqual({ id: 12, name: "Team Board", slug: "team-board" });
    expect(result.window.label).toBe("Custom: 2025-01-01 to 2025-01-03");
    expect(result.statusCount).toBe(2);
    expect(result.storiesFetched).toBe(3);
    expect(result.storiesInWindow).toBe(2);
    expect(result.summary?.growth).toBe(1);
    expect(result.warnings).toEqual([]);
    expect(progress).toContain("Fetched page 1 (3 stories)");
    expect(progress.at(-1)).toBe(`CFD data saved to ${file}`);
  });

  it("keeps stories created before the window when configured", async () => {
    const result = await runCfdGeneration({
      cwd: makeCwd(),
      config: makeConfig({ includeStoriesBeforeWindow: true }),
      source: fakeSource(),
      request,
      now: new Date("2025-01-03T00:00:00Z"),
    });

    expect(result.storiesInWindow).toBe(3);
    expect(result.series.map((snapshot) => snapshot.total)).toEqual([2, 2, 3]);
    expect(result.series[2]?.counts).toEqual({ New: 2, Done: 1 });
    expect(result.runId).toMatch(/^[0-9a-z]{8}$/);
  });

  it("collects warnings for mismatched ids and partial listings", async () => {
    const warnings: string[] = [];
    const source = fakeSource({ pages: 4, skipped: 2, truncated: true });

    const result = await runCfdGeneration({
      cwd: makeCwd(),
      config: makeConfig({ projectId: 99, maxPages: 4 }),
      source,
      request: { ...request, granularity: "hourly" },
      now: new Date("2025-01-03T00:00:00Z"),
      onWarning: (message) => warnings.push(message),
    });

    expect(source.requestedPages).toEqual([4]);
    expect(result.granularity).toBe("daily");
    expect(result.warnings).toEqual([
      "Unknown granularity 'hourly', defaulting to daily",
      "Configured project id 99 does not match team-board (ID: 12); using 12",
      "Stopped after 4 pages (maxPages=4); later stories are missing",
      "Ignored 2 malformed story records from the API",
    ]);
    expect(warnings).toEqual(result.warnings);
  });

  it("refuses to run without a configured project", async () => {
    await expect(
      runCfdGeneration({
        cwd: makeCwd(),
        config: defaultProjectConfig,
        source: fakeSource(),
      }),
    ).rejects.toThrow("Project is not configured");
  });

  it("returns a failed write instead of throwing", async () => {
    const cwd = makeCwd();
    fs.writeFileSync(path.join(cwd, "reports"), "occupied", "utf8");

    const result = await runCfdGeneration({
      cwd,
      config: makeConfig(),
      source: fakeSource(),
      request,
      now: new Date("2025-01-03T00:00:00Z"),
    });
    expect(result.write.ok).toBe(false);
    expect(result.series).toHaveLength(3);
  });
});
