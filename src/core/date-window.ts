import { DAY_MS, formatDate, normalizeInstant } from "./dates";
import type { DateWindow, WarningSink } from "./types";

export type DateRangePreset =
  | "last-1-month"
  | "last-3-months"
  | "last-6-months"
  | "last-12-months"
  | "year-to-date";

export const DATE_RANGE_PRESETS: readonly DateRangePreset[] = [
  "last-1-month",
  "last-3-months",
  "last-6-months",
  "last-12-months",
  "year-to-date",
];

const PRESET_DAYS: Record<Exclude<DateRangePreset, "year-to-date">, number> = {
  "last-1-month": 30,
  "last-3-months": 90,
  "last-6-months": 180,
  "last-12-months": 365,
};

export interface DateWindowRequest {
  now: Date;
  monthsBack: number;
  preset?: DateRangePreset;
  /** `YYYY-MM-DD` (or any ISO-8601 instant). */
  start?: string;
  end?: string;
}

export interface ResolvedDateWindow extends DateWindow {
  label: string;
}

export const isDateRangePreset = (value: unknown): value is DateRangePreset =>
  typeof value === "string" &&
  DATE_RANGE_PRESETS.some((preset) => preset === value);

export const monthsBackWindow = (
  now: Date,
  monthsBack: number,
): ResolvedDateWindow => {
  const months = Number.isFinite(monthsBack) && monthsBack > 0 ? monthsBack : 6;
  return {
    start: new Date(now.getTime() - months * 30 * DAY_MS),
    end: new Date(now.getTime()),
    label: `Last ${months} months`,
  };
};

export const presetWindow = (
  preset: DateRangePreset,
  now: Date,
): ResolvedDateWindow => {
  const end = new Date(now.getTime());
  if (preset === "year-to-date") {
    return {
      start: new Date(Date.UTC(now.getUTCFullYear(), 0, 1)),
      end,
      label: `Year to date ${now.getUTCFullYear()}`,
    };
  }

  return {
    start: new Date(now.getTime() - PRESET_DAYS[preset] * DAY_MS),
    end,
    label: preset
      .split("-")
      .map((word, index) =>
        index === 0 ? word.charAt(0).toUpperCase() + word.slice(1) : word,
      )
      .join(" "),
  };
};

/**
 * Custom ranges win over presets, presets over months-back. A custom range
 * that does not parse, or ends before it starts, falls back to the
 * months-back window with a warning.
 */
export const resolveDateWindow = (
  request: DateWindowRequest,
  onWarning?: WarningSink,
): ResolvedDateWindow => {
  const fallback = () => monthsBackWindow(request.now, request.monthsBack);

  if (request.start !== undefined || request.end !== undefined) {
    if (request.start === undefined) {
      onWarning?.("End date given without a start date, using default range");
      return fallback();
    }

    const start = normalizeInstant(request.start);
    if (!start.ok) {
      onWarning?.(`Invalid start date (${start.reason}), using default range`);
      return fallback();
    }

    const end =
      request.end === undefined
        ? { ok: true as const, instant: new Date(request.now.getTime()) }
        : normalizeInstant(request.end);
    if (!end.ok) {
      onWarning?.(`Invalid end date (${end.reason}), using default range`);
      return fallback();
    }

    if (end.instant.getTime() < start.instant.getTime()) {
      onWarning?.("End date must be after start date, using default range");
      return fallback();
    }

    return {
      start: start.instant,
      end: end.instant,
      label: `Custom: ${formatDate(start.instant)} to ${formatDate(end.instant)}`,
    };
  }

  if (request.preset) {
    return presetWindow(request.preset, request.now);
  }

  return fallback();
};
