import { isDateRangePreset } from "../core/date-window";
import { DASHBOARD_SECTIONS, type DashboardSection } from "../observability/dashboard";
import type { CfdRunRequest } from "../runtime/cfd-run";

const DATE_LIKE = /^\d{4}-\d{2}-\d{2}/;

/**
 * `/cfd generate` arguments in any order: a preset name, up to two dates
 * (start, then end) and a granularity. Anything else is taken as the
 * granularity so the run can warn about it and fall back to daily.
 */
export const parseGenerateArgs = (args: string[]): CfdRunRequest => {
  const request: CfdRunRequest = {};
  for (const arg of args) {
    if (isDateRangePreset(arg)) {
      request.preset = arg;
    } else if (DATE_LIKE.test(arg) && request.start === undefined) {
      request.start = arg;
    } else if (DATE_LIKE.test(arg) && request.end === undefined) {
      request.end = arg;
    } else {
      request.granularity = arg;
    }
  }
  return request;
};

export const parseDashboardSection = (input?: string): DashboardSection => {
  const section = input ?? "summary";
  const match = DASHBOARD_SECTIONS.find((candidate) => candidate === section);
  if (!match) {
    throw new Error(
      `dashboard section must be one of: ${DASHBOARD_SECTIONS.join(", ")}`,
    );
  }
  return match;
};

export const parseDashboardArgs = (
  args: string[],
): { section: DashboardSection; page: number; file?: string } => {
  const [section, rawPage, file] = args;
  const page = Number(rawPage ?? "1");
  return {
    section: parseDashboardSection(section),
    page: Number.isFinite(page) && page >= 1 ? Math.floor(page) : 1,
    ...(file ? { file } : {}),
  };
};
