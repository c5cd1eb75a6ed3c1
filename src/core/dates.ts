import {
  GRANULARITIES,
  type Granularity,
  type InstantInput,
  type WarningSink,
} from "./types";

export const DAY_MS = 24 * 60 * 60 * 1000;

const STRIDE_DAYS: Record<Granularity, number> = {
  daily: 1,
  weekly: 7,
  // Fixed stride, not calendar months.
  monthly: 30,
};

export type InstantResult =
  | { ok: true; instant: Date }
  | { ok: false; reason: string };

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
const utcMs = (
  year: number,
  monthIndex: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millis = 0,
): number => {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime();
};

const daysInMonth = (year: number, month: number): number =>
  new Date(utcMs(year, month, 0)).getUTCDate();

const offsetMinutes = (designator: string | undefined): number => {
  if (!designator || designator.toUpperCase() === "Z") {
    return 0;
  }

  const sign = designator.startsWith("-") ? -1 : 1;
  const digits = designator.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
};

const parseIsoString = (raw: string): InstantResult => {
  const match = ISO_PATTERN.exec(raw.trim());
  if (!match) {
    return { ok: false, reason: `unrecognized timestamp: ${raw}` };
  }

  const [, y, mo, d, hh, mi, ss, fraction, designator] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(hh ?? "0");
  const minute = Number(mi ?? "0");
  const second = Number(ss ?? "0");
  const millis = fraction ? Number(`${fraction.slice(1)}00`.slice(0, 3)) : 0;

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return { ok: false, reason: `timestamp out of range: ${raw}` };
  }

  const utc = utcMs(year, month - 1, day, hour, minute, second, millis);
  // Timestamps without a designator are taken as UTC.
  return {
    ok: true,
    instant: new Date(utc - offsetMinutes(designator) * 60_000),
  };
};

/**
 * Single entry point for turning story and window timestamps into UTC
 * instants. Accepts ISO-8601 strings (date-only, with or without `Z`, or with
 * an offset), epoch milliseconds and `Date` objects.
 */
export const normalizeInstant = (
  value: InstantInput | null | undefined,
): InstantResult => {
  if (value === null || value === undefined) {
    return { ok: false, reason: "missing timestamp" };
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? { ok: false, reason: "invalid date" }
      : { ok: true, instant: new Date(value.getTime()) };
  }

  if (typeof value === "number") {
    return Number.isFinite(value)
      ? { ok: true, instant: new Date(value) }
      : { ok: false, reason: `invalid epoch value: ${value}` };
  }

  return parseIsoString(value);
};

export const isGranularity = (value: unknown): value is Granularity =>
  typeof value === "string" &&
  GRANULARITIES.some((granularity) => granularity === value);

/** Unknown values fall back to daily and are reported, never rejected. */
export const parseGranularity = (
  value: unknown,
  onWarning?: WarningSink,
): Granularity => {
  if (isGranularity(value)) {
    return value;
  }

  onWarning?.(`Unknown granularity '${String(value)}', defaulting to daily`);
  return "daily";
};

export const strideMs = (granularity: Granularity): number =>
  STRIDE_DAYS[granularity] * DAY_MS;

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, "0");

export const formatDate = (date: Date): string =>
  `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;

/** `YYYYMMDD_HHMMSS` in UTC, used in generated file names. */
export const formatTimestamp = (date: Date): string =>
  `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
