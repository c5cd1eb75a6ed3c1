import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { defaultProjectConfig, loadProjectConfig } from "../src/project/config";

const makeCwd = () => fs.mkdtempSync(path.join(os.tmpdir(), "cfd-project-"));

const writeFile = (file: string, content: string) => {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf8");
};

describe("project config", () => {
  it("returns defaults when no config file exists", () => {
    const loaded = loadProjectConfig(makeCwd(), { env: {} });

    expect(loaded.source).toBe("defaults");
    expect(loaded.config).toEqual(defaultProjectConfig);
  });

  it("loads and filters .cfd/project.json", () => {
    const cwd = makeCwd();
    writeFile(
      path.join(cwd, ".cfd", "project.json"),
      JSON.stringify({
        projectSlug: "team-board",
        projectId: 12,
        granularity: "weekly",
        monthsBack: 3,
        pageSize: -5,
        outputDir: "reports",
        includeStoriesBeforeWindow: true,
      }),
    );

    const loaded = loadProjectConfig(cwd, { env: {} });
    expect(loaded.source).toBe("project.json");
    expect(loaded.config).toEqual({
      ...defaultProjectConfig,
      projectSlug: "team-board",
      projectId: 12,
      granularity: "weekly",
      monthsBack: 3,
      outputDir: "reports",
      includeStoriesBeforeWindow: true,
    });
  });

  it("prefers .cfd/project.ts when present", () => {
    const cwd = makeCwd();
    writeFile(
      path.join(cwd, ".cfd", "project.ts"),
      `export default {
        projectSlug: "from-ts",
        projectId: 3,
        granularity: "monthly",
      };`,
    );
    writeFile(
      path.join(cwd, ".cfd", "project.json"),
      JSON.stringify({ projectSlug: "from-json" }),
    );

    const loaded = loadProjectConfig(cwd, { env: {} });
    expect(loaded.source).toBe("project.ts");
    expect(loaded.config.projectSlug).toBe("from-ts");
    expect(loaded.config.projectId).toBe(3);
    expect(loaded.config.granularity).toBe("monthly");
  });

  it("reads the legacy project_config.json", () => {
    const cwd = makeCwd();
    writeFile(
      path.join(cwd, "project_config.json"),
      JSON.stringify({ project_slug: "legacy-board", project_id: 42 }),
    );

    const loaded = loadProjectConfig(cwd, { env: {} });
    expect(loaded.source).toBe("project_config.json");
    expect(loaded.config.projectSlug).toBe("legacy-board");
    expect(loaded.config.projectId).toBe(42);
  });

  it("lets environment variables override the file", () => {
    const cwd = makeCwd();
    writeFile(
      path.join(cwd, ".cfd", "project.json"),
      JSON.stringify({ projectSlug: "from-file", projectId: 1 }),
    );

    const loaded = loadProjectConfig(cwd, {
      env: {
        TAIGA_API_BASE_URL: "https://taiga.example.test",
        TAIGA_PROJECT_SLUG: "from-env",
        TAIGA_PROJECT_ID: "77",
      },
    });
    expect(loaded.config.apiBaseUrl).toBe("https://taiga.example.test");
    expect(loaded.config.projectSlug).toBe("from-env");
    expect(loaded.config.projectId).toBe(77);
  });

  it("warns about an invalid project id in the environment", () => {
    const warnings: string[] = [];
    const loaded = loadProjectConfig(makeCwd(), {
      env: { TAIGA_PROJECT_ID: "abc" },
      onWarning: (message) => warnings.push(message),
    });

    expect(loaded.config.projectId).toBe(0);
    expect(warnings).toEqual([
      "Invalid TAIGA_PROJECT_ID in environment (must be integer)",
    ]);
  });

  it("warns about an unknown granularity and falls back to daily", () => {
    const cwd = makeCwd();
    writeFile(
      path.join(cwd, ".cfd", "project.json"),
      JSON.stringify({ granularity: "hourly" }),
    );
    const warnings: string[] = [];

    const loaded = loadProjectConfig(cwd, {
      env: {},
      onWarning: (message) => warnings.push(message),
    });
    expect(loaded.config.granularity).toBe("daily");
    expect(warnings).toEqual([
      "Unknown granularity 'hourly' in project config, defaulting to daily",
    ]);
  });
});
