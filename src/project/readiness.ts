import type { StoredToken } from "../taiga/token-store";
import type { ProjectConfig } from "./config";

export interface ReadinessReport {
  ready: boolean;
  reasons: string[];
  summary: {
    project: string;
    user: string;
    granularity: string;
    maxStories: number;
  };
}

export const buildReadinessReport = (input: {
  config: ProjectConfig;
  token: StoredToken | null;
}): ReadinessReport => {
  const { config, token } = input;
  const reasons: string[] = [];
  if (!config.projectSlug) {
    reasons.push("No project slug configured (projectSlug or TAIGA_PROJECT_SLUG)");
  }
  if (config.projectId <= 0) {
    reasons.push("No project id configured (projectId or TAIGA_PROJECT_ID)");
  }
  if (!token) {
    reasons.push("No saved Taiga token; log in first");
  }

  return {
    ready: reasons.length === 0,
    reasons,
    summary: {
      project: config.projectSlug
        ? `${config.projectSlug} (ID: ${config.projectId})`
        : "unconfigured",
      user: token?.user.full_name ?? token?.user.username ?? "anonymous",
      granularity: config.granularity,
      maxStories: config.pageSize * config.maxPages,
    },
  };
};
