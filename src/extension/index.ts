import path from "node:path";
import type {
  ExtensionAPI,
  ExtensionCommandContext,
} from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";
import {
  buildCommandHelpLines,
  buildInteractiveDashboardLines,
  buildReadinessLines,
  buildRunLines,
  buildSummaryLines,
} from "../observability/dashboard";
import { bootstrapProjectConfig } from "../project/bootstrap";
import { type LoadedProjectConfig, loadProjectConfig } from "../project/config";
import { buildReadinessReport } from "../project/readiness";
import {
  type CfdRunRequest,
  type CfdRunResult,
  runCfdGeneration,
} from "../runtime/cfd-run";
import { loadSeriesReport } from "../runtime/series-report";
import { TaigaClient } from "../taiga/client";
import { TokenStore } from "../taiga/token-store";
import { parseDashboardArgs, parseGenerateArgs } from "./args";

const asToolResult = (payload: unknown) => ({
  content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
  details: payload,
});

const granularityParam = Type.Union([
  Type.Literal("daily"),
  Type.Literal("weekly"),
  Type.Literal("monthly"),
]);

const presetParam = Type.Union([
  Type.Literal("last-1-month"),
  Type.Literal("last-3-months"),
  Type.Literal("last-6-months"),
  Type.Literal("last-12-months"),
  Type.Literal("year-to-date"),
]);

const sectionParam = Type.Union([
  Type.Literal("summary"),
  Type.Literal("series"),
  Type.Literal("trend"),
  Type.Literal("statuses"),
]);

const runResultPayload = (result: CfdRunResult) => ({
  runId: result.runId,
  project: result.project,
  window: {
    label: result.window.label,
    start: result.window.start.toISOString(),
    end: result.window.end.toISOString(),
  },
  granularity: result.granularity,
  storiesFetched: result.storiesFetched,
  storiesInWindow: result.storiesInWindow,
  truncated: result.truncated,
  write: result.write,
  summary: result.summary,
  warnings: result.warnings,
  lines: [...buildRunLines(result), ...buildSummaryLines(result.summary)],
});

export default function (pi: ExtensionAPI): void {
  const cwd = process.cwd();

  const loadConfig = (warnings: string[]): LoadedProjectConfig =>
    loadProjectConfig(cwd, { onWarning: (message) => warnings.push(message) });

  const tokenStore = (dir: string, warnings: string[]) =>
    new TokenStore(path.resolve(cwd, dir), (message) =>
      warnings.push(message),
    );

  const generate = async (
    request: CfdRunRequest,
    onProgress?: (message: string) => void,
  ): Promise<CfdRunResult> => {
    const setupWarnings: string[] = [];
    const { config } = loadConfig(setupWarnings);
    const token = tokenStore(config.tokenDir, setupWarnings).loadLatest();
    if (!token) {
      throw new Error("No saved Taiga token; run the cfd_login tool first");
    }

    const client = new TaigaClient({
      baseUrl: config.apiBaseUrl,
      token: token.authToken,
      timeoutMs: config.requestTimeoutMs,
    });
    const result = await runCfdGeneration({
      cwd,
      config,
      source: client,
      request,
      ...(onProgress ? { onProgress } : {}),
    });
    return { ...result, warnings: [...setupWarnings, ...result.warnings] };
  };

  pi.on("session_start", async (_event, ctx) => {
    const warnings: string[] = [];
    const { config } = loadConfig(warnings);
    const report = buildReadinessReport({
      config,
      token: tokenStore(config.tokenDir, warnings).loadLatest(),
    });
    ctx.ui.setStatus(
      "cfd",
      report.ready
        ? `cfd: ${report.summary.project}`
        : `cfd: not ready (${report.reasons.length} issues)`,
    );
  });

  pi.registerTool({
    name: "cfd_login",
    label: "CFD Login",
    description: "Authenticate against Taiga and save the token for later runs",
    parameters: Type.Object({
      username: Type.String({ description: "Taiga username or email" }),
      password: Type.String(),
    }),
    async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
      const warnings: string[] = [];
      const { config } = loadConfig(warnings);
      const client = new TaigaClient({
        baseUrl: config.apiBaseUrl,
        timeoutMs: config.requestTimeoutMs,
      });
      const { authToken, user } = await client.authenticate(
        params.username,
        params.password,
      );
      const saved = tokenStore(config.tokenDir, warnings).save({
        authToken,
        user,
      });
      ctx.ui.notify(`Logged in as ${user.full_name ?? user.username}`, "info");
      return asToolResult({ user, file: saved.file, warnings });
    },
  });

  pi.registerTool({
    name: "cfd_generate",
    label: "CFD Generate",
    description:
      "Fetch Taiga stories and write cumulative flow diagram data to CSV",
    parameters: Type.Object({
      preset: Type.Optional(presetParam),
      startDate: Type.Optional(Type.String({ description: "YYYY-MM-DD" })),
      endDate: Type.Optional(Type.String({ description: "YYYY-MM-DD" })),
      granularity: Type.Optional(granularityParam),
    }),
    async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
      const result = await generate({
        ...(params.preset ? { preset: params.preset } : {}),
        ...(params.startDate ? { start: params.startDate } : {}),
        ...(params.endDate ? { end: params.endDate } : {}),
        ...(params.granularity ? { granularity: params.granularity } : {}),
      });
      ctx.ui.notify(
        result.write.ok
          ? `CFD data saved to ${result.write.file}`
          : `CFD write failed: ${result.write.error}`,
        result.write.ok ? "info" : "error",
      );
      return asToolResult(runResultPayload(result));
    },
  });

  pi.registerTool({
    name: "cfd_summary",
    label: "CFD Summary",
    description: "Summarize a CFD CSV file (latest by default)",
    parameters: Type.Object({ file: Type.Optional(Type.String()) }),
    async execute(_toolCallId, params) {
      const warnings: string[] = [];
      const { config } = loadConfig(warnings);
      const report = loadSeriesReport({
        cwd,
        config,
        ...(params.file ? { file: params.file } : {}),
      });
      if (!report) {
        return asToolResult({ error: "no_cfd_files", warnings });
      }

      return asToolResult({
        file: report.file,
        summary: report.summary,
        trend: {
          peakTotal: report.trend.peakTotal,
          averageChange: report.trend.averageChange,
        },
        lines: buildSummaryLines(report.summary),
        warnings,
      });
    },
  });

  pi.registerTool({
    name: "cfd_dashboard_view",
    label: "CFD Dashboard View",
    description: "Render summary, series, trend or status tables for a CFD file",
    parameters: Type.Object({
      section: Type.Optional(sectionParam),
      page: Type.Optional(Type.Number({ minimum: 1, default: 1 })),
      pageSize: Type.Optional(
        Type.Number({ minimum: 1, maximum: 50, default: 14 }),
      ),
      file: Type.Optional(Type.String()),
    }),
    async execute(_toolCallId, params) {
      const warnings: string[] = [];
      const { config } = loadConfig(warnings);
      const report = loadSeriesReport({
        cwd,
        config,
        ...(params.file ? { file: params.file } : {}),
      });
      if (!report) {
        return asToolResult({ error: "no_cfd_files", warnings });
      }

      const section = params.section ?? "summary";
      return asToolResult({
        section,
        file: report.file,
        lines: buildInteractiveDashboardLines({
          section,
          page: params.page ?? 1,
          pageSize: params.pageSize ?? 14,
          series: report.series,
          summary: report.summary,
          trend: report.trend,
          source: report.file,
        }),
      });
    },
  });

  pi.registerTool({
    name: "cfd_project_status",
    label: "CFD Project Status",
    description: "Show the loaded CFD project configuration",
    parameters: Type.Object({}),
    async execute() {
      const warnings: string[] = [];
      const loaded = loadConfig(warnings);
      return asToolResult({ ...loaded, warnings });
    },
  });

  pi.registerTool({
    name: "cfd_project_bootstrap",
    label: "CFD Project Bootstrap",
    description: "Generate .cfd/project.ts from defaults",
    parameters: Type.Object({
      force: Type.Optional(Type.Boolean({ default: false })),
      projectSlug: Type.Optional(Type.String()),
      projectId: Type.Optional(Type.Integer({ minimum: 1 })),
      granularity: Type.Optional(granularityParam),
      monthsBack: Type.Optional(Type.Integer({ minimum: 1 })),
      maxPages: Type.Optional(Type.Integer({ minimum: 1 })),
    }),
    async execute(_toolCallId, params) {
      const result = bootstrapProjectConfig(cwd, {
        force: params.force ?? false,
        overrides: {
          ...(params.projectSlug ? { projectSlug: params.projectSlug } : {}),
          ...(params.projectId ? { projectId: params.projectId } : {}),
          ...(params.granularity ? { granularity: params.granularity } : {}),
          ...(params.monthsBack ? { monthsBack: params.monthsBack } : {}),
          ...(params.maxPages ? { maxPages: params.maxPages } : {}),
        },
      });
      const warnings: string[] = [];
      return asToolResult({ result, ...loadConfig(warnings), warnings });
    },
  });

  pi.registerTool({
    name: "cfd_readiness",
    label: "CFD Readiness",
    description: "Check project configuration and saved token before a run",
    parameters: Type.Object({}),
    async execute() {
      const warnings: string[] = [];
      const { config } = loadConfig(warnings);
      const report = buildReadinessReport({
        config,
        token: tokenStore(config.tokenDir, warnings).loadLatest(),
      });
      return asToolResult({ report, warnings });
    },
  });

  pi.registerCommand("cfd", {
    description: "Generate and inspect Taiga cumulative flow data",
    handler: async (args, ctx) => {
      await handleCommand(args, ctx, {
        cwd,
        loadConfig,
        tokenStore,
        generate,
      });
    },
  });
}

interface CommandDeps {
  cwd: string;
  loadConfig: (warnings: string[]) => LoadedProjectConfig;
  tokenStore: (dir: string, warnings: string[]) => TokenStore;
  generate: (
    request: CfdRunRequest,
    onProgress?: (message: string) => void,
  ) => Promise<CfdRunResult>;
}

const notifyWarnings = (ctx: ExtensionCommandContext, warnings: string[]) => {
  for (const warning of warnings) {
    ctx.ui.notify(warning, "warning");
  }
};

const handleCommand = async (
  args: string,
  ctx: ExtensionCommandContext,
  deps: CommandDeps,
): Promise<void> => {
  const [command, ...rest] = args.trim().split(/\s+/).filter(Boolean);

  if (!command || command === "status" || command === "readiness") {
    const warnings: string[] = [];
    const { config } = deps.loadConfig(warnings);
    const report = buildReadinessReport({
      config,
      token: deps.tokenStore(config.tokenDir, warnings).loadLatest(),
    });
    notifyWarnings(ctx, warnings);
    ctx.ui.setWidget("cfd", buildReadinessLines(report));
    ctx.ui.notify(
      report.ready ? "cfd: ready" : `cfd: ${report.reasons.length} issues`,
      report.ready ? "info" : "warning",
    );
    return;
  }

  if (command === "generate") {
    try {
      const result = await deps.generate(parseGenerateArgs(rest), (message) =>
        ctx.ui.setStatus("cfd", `cfd: ${message}`),
      );
      ctx.ui.setWidget("cfd", [
        ...buildRunLines(result),
        ...buildSummaryLines(result.summary),
      ]);
      ctx.ui.setStatus("cfd", `cfd: ${result.project.slug}`);
      ctx.ui.notify(
        result.write.ok
          ? `CFD data saved to ${result.write.file}`
          : `CFD write failed: ${result.write.error}`,
        result.write.ok ? "info" : "error",
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown error";
      ctx.ui.notify(`cfd generate error: ${message}`, "error");
    }
    return;
  }

  if (command === "summary" || command === "dashboard") {
    try {
      const warnings: string[] = [];
      const { config } = deps.loadConfig(warnings);
      notifyWarnings(ctx, warnings);
      const view =
        command === "summary"
          ? {
              section: "summary" as const,
              page: 1,
              ...(rest[0] ? { file: rest[0] } : {}),
            }
          : parseDashboardArgs(rest);
      const report = loadSeriesReport({
        cwd: deps.cwd,
        config,
        ...(view.file ? { file: view.file } : {}),
      });
      if (!report) {
        ctx.ui.notify("No CFD files found; run /cfd generate first", "warning");
        return;
      }

      ctx.ui.setWidget(
        "cfd",
        buildInteractiveDashboardLines({
          section: view.section,
          page: view.page,
          pageSize: 14,
          series: report.series,
          summary: report.summary,
          trend: report.trend,
          source: report.file,
        }),
      );
      ctx.ui.notify(`cfd ${view.section}: ${report.file}`, "info");
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid input";
      ctx.ui.notify(`cfd ${command} error: ${message}`, "error");
    }
    return;
  }

  if (command === "project") {
    const warnings: string[] = [];
    const { config, source } = deps.loadConfig(warnings);
    notifyWarnings(ctx, warnings);
    ctx.ui.setWidget("cfd", [
      `source=${source}`,
      ...Object.entries(config).map(([key, value]) => `${key}=${String(value)}`),
    ]);
    return;
  }

  if (command === "bootstrap") {
    const result = bootstrapProjectConfig(deps.cwd, {
      force: rest[0] === "force",
    });
    ctx.ui.notify(
      result.skipped
        ? `bootstrap skipped: ${result.reason ?? "exists"}`
        : `wrote ${result.file}`,
      result.skipped ? "warning" : "info",
    );
    return;
  }

  if (command === "help") {
    ctx.ui.setWidget("cfd", buildCommandHelpLines());
    return;
  }

  ctx.ui.notify(`unknown cfd command: ${command}`, "warning");
  ctx.ui.setWidget("cfd", buildCommandHelpLines());
};
