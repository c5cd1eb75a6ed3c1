import fs from "node:fs";
import path from "node:path";
import { CONFIG_DIR, type ProjectConfig, defaultProjectConfig } from "./config";

const toLiteral = (value: unknown): string => JSON.stringify(value);

const buildTemplate = (config: ProjectConfig): string => `export default {
  apiBaseUrl: ${toLiteral(config.apiBaseUrl)},
  projectSlug: ${toLiteral(config.projectSlug)},
  projectId: ${config.projectId},
  granularity: ${toLiteral(config.granularity)},
  monthsBack: ${config.monthsBack},
  outputDir: ${toLiteral(config.outputDir)},
  tokenDir: ${toLiteral(config.tokenDir)},
  pageSize: ${config.pageSize},
  maxPages: ${config.maxPages},
  requestTimeoutMs: ${config.requestTimeoutMs},
  includeStoriesBeforeWindow: ${config.includeStoriesBeforeWindow},
};
`;

export interface ProjectBootstrapOptions {
  force?: boolean;
  overrides?: Partial<ProjectConfig>;
}

export interface ProjectBootstrapResult {
  file: string;
  created: boolean;
  overwritten: boolean;
  skipped: boolean;
  reason?: string;
}

/** Writes `.cfd/project.ts` seeded from defaults plus overrides. */
export const bootstrapProjectConfig = (
  cwd: string,
  options: ProjectBootstrapOptions = {},
): ProjectBootstrapResult => {
  const file = path.join(cwd, CONFIG_DIR, "project.ts");
  const exists = fs.existsSync(file);

  if (exists && !options.force) {
    return {
      file,
      created: false,
      overwritten: false,
      skipped: true,
      reason: "project.ts already exists (use force to overwrite)",
    };
  }

  const merged: ProjectConfig = {
    ...defaultProjectConfig,
    ...(options.overrides ?? {}),
  };

  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, buildTemplate(merged), "utf8");

  return {
    file,
    created: !exists,
    overwritten: exists,
    skipped: false,
  };
};
