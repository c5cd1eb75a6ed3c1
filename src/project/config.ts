import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { isGranularity } from "../core/dates";
import type { Granularity, WarningSink } from "../core/types";

export const CONFIG_DIR = ".cfd";

export interface ProjectConfig {
  apiBaseUrl: string;
  projectSlug: string;
  /** Taiga numeric project id; 0 means not configured. */
  projectId: number;
  granularity: Granularity;
  monthsBack: number;
  /** Where CSV files are written, relative to the working directory. */
  outputDir: string;
  tokenDir: string;
  pageSize: number;
  /**
   * Upper bound on story pages fetched per run. Reaching it with a full last
   * page is reported as a truncated fetch.
   */
  maxPages: number;
  requestTimeoutMs: number;
  /**
   * When false, stories created before the window start are left out so the
   * diagram starts at zero.
   */
  includeStoriesBeforeWindow: boolean;
}

export type ProjectConfigSource =
  | "project.ts"
  | "project.json"
  | "project_config.json"
  | "defaults";

export interface LoadedProjectConfig {
  config: ProjectConfig;
  source: ProjectConfigSource;
}

export const defaultProjectConfig: ProjectConfig = {
  apiBaseUrl: "https://api.taiga.io",
  projectSlug: "",
  projectId: 0,
  granularity: "daily",
  monthsBack: 6,
  outputDir: ".",
  tokenDir: CONFIG_DIR,
  pageSize: 100,
  maxPages: 20,
  requestTimeoutMs: 30_000,
  includeStoriesBeforeWindow: false,
};

export interface LoadProjectConfigOptions {
  env?: NodeJS.ProcessEnv;
  onWarning?: WarningSink;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const positiveInteger = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isInteger(value) && value > 0
    ? value
    : undefined;

const nonEmptyString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0
    ? value.trim()
    : undefined;

const normalizeProjectConfig = (
  parsed: unknown,
  onWarning?: WarningSink,
): ProjectConfig => {
  if (!isRecord(parsed)) {
    return defaultProjectConfig;
  }

  const granularity = parsed.granularity;
  if (granularity !== undefined && !isGranularity(granularity)) {
    onWarning?.(
      `Unknown granularity '${String(granularity)}' in project config, defaulting to daily`,
    );
  }

  const defaults = defaultProjectConfig;
  return {
    apiBaseUrl: nonEmptyString(parsed.apiBaseUrl) ?? defaults.apiBaseUrl,
    projectSlug: nonEmptyString(parsed.projectSlug) ?? defaults.projectSlug,
    projectId: positiveInteger(parsed.projectId) ?? defaults.projectId,
    granularity: isGranularity(granularity)
      ? granularity
      : defaults.granularity,
    monthsBack: positiveInteger(parsed.monthsBack) ?? defaults.monthsBack,
    outputDir: nonEmptyString(parsed.outputDir) ?? defaults.outputDir,
    tokenDir: nonEmptyString(parsed.tokenDir) ?? defaults.tokenDir,
    pageSize: positiveInteger(parsed.pageSize) ?? defaults.pageSize,
    maxPages: positiveInteger(parsed.maxPages) ?? defaults.maxPages,
    requestTimeoutMs:
      positiveInteger(parsed.requestTimeoutMs) ?? defaults.requestTimeoutMs,
    includeStoriesBeforeWindow:
      typeof parsed.includeStoriesBeforeWindow === "boolean"
        ? parsed.includeStoriesBeforeWindow
        : defaults.includeStoriesBeforeWindow,
  };
};

const fromLegacyConfig = (parsed: unknown): Record<string, unknown> =>
  isRecord(parsed)
    ? { projectSlug: parsed.project_slug, projectId: parsed.project_id }
    : {};

const readJson = (file: string): unknown =>
  JSON.parse(fs.readFileSync(file, "utf8"));

const loadRawConfig = (
  cwd: string,
  onWarning?: WarningSink,
): { raw: unknown; source: ProjectConfigSource } => {
  const tsPath = path.join(cwd, CONFIG_DIR, "project.ts");
  if (fs.existsSync(tsPath)) {
    try {
      const jiti = createJiti(import.meta.url);
      const loaded: unknown = jiti(tsPath);
      const raw =
        isRecord(loaded) && "default" in loaded
          ? (loaded.default ?? loaded)
          : loaded;
      return { raw, source: "project.ts" };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      onWarning?.(`Could not load ${tsPath}: ${message}`);
    }
  }

  const jsonPath = path.join(cwd, CONFIG_DIR, "project.json");
  if (fs.existsSync(jsonPath)) {
    return { raw: readJson(jsonPath), source: "project.json" };
  }

  const legacyPath = path.join(cwd, "project_config.json");
  if (fs.existsSync(legacyPath)) {
    return {
      raw: fromLegacyConfig(readJson(legacyPath)),
      source: "project_config.json",
    };
  }

  return { raw: {}, source: "defaults" };
};

const applyEnvironment = (
  config: ProjectConfig,
  env: NodeJS.ProcessEnv,
  onWarning?: WarningSink,
): ProjectConfig => {
  const next = { ...config };
  const baseUrl = nonEmptyString(env.TAIGA_API_BASE_URL);
  if (baseUrl) {
    next.apiBaseUrl = baseUrl;
  }

  const slug = nonEmptyString(env.TAIGA_PROJECT_SLUG);
  if (slug) {
    next.projectSlug = slug;
  }

  const rawId = nonEmptyString(env.TAIGA_PROJECT_ID);
  if (rawId) {
    const id = Number(rawId);
    if (Number.isInteger(id) && id > 0) {
      next.projectId = id;
    } else {
      onWarning?.("Invalid TAIGA_PROJECT_ID in environment (must be integer)");
    }
  }

  return next;
};

/**
 * Reads `.cfd/project.ts`, then `.cfd/project.json`, then the legacy
 * `project_config.json`; environment variables override whichever was found.
 * The returned value is meant to be passed through one run, not cached.
 */
export const loadProjectConfig = (
  cwd: string,
  options: LoadProjectConfigOptions = {},
): LoadedProjectConfig => {
  const { raw, source } = loadRawConfig(cwd, options.onWarning);
  const config = applyEnvironment(
    normalizeProjectConfig(raw, options.onWarning),
    options.env ?? process.env,
    options.onWarning,
  );
  return { config, source };
};
