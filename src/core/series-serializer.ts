import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { formatDate, formatTimestamp, normalizeInstant } from "./dates";
import type { BucketSnapshot, Granularity, RunId, Series } from "./types";

export const SERIES_FILE_GLOB = "cfd_data_*.csv";

const LINE_END = "\r\n";

export type SeriesWriteResult =
  | { ok: true; file: string; rows: number; columns: string[] }
  | { ok: false; file: string; error: string };

export const statusColumns = (series: Series): string[] => {
  const names = new Set<string>();
  for (const snapshot of series) {
    for (const name of Object.keys(snapshot.counts)) {
      names.add(name);
    }
  }
  return [...names].sort();
};

const countFor = (snapshot: BucketSnapshot, name: string): number =>
  Object.hasOwn(snapshot.counts, name) ? (snapshot.counts[name] ?? 0) : 0;

const escapeField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const serializeSeries = (series: Series): string => {
  const statuses = statusColumns(series);
  const lines = [["date", "total", ...statuses].map(escapeField).join(",")];

  for (const snapshot of series) {
    lines.push(
      [
        formatDate(snapshot.date),
        String(snapshot.total),
        ...statuses.map((name) => String(countFor(snapshot, name))),
      ].join(","),
    );
  }

  return lines.map((line) => `${line}${LINE_END}`).join("");
};

export const writeSeriesFile = (
  series: Series,
  file: string,
): SeriesWriteResult => {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeSeries(series), "utf8");
  } catch (error) {
    return {
      ok: false,
      file,
      error: error instanceof Error ? error.message : String(error),
    };
  }

  return {
    ok: true,
    file,
    rows: series.length,
    columns: ["date", "total", ...statusColumns(series)],
  };
};

const parseRecords = (text: string): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;
  let index = 0;

  const endField = () => {
    record.push(field);
    field = "";
  };
  const endRecord = () => {
    endField();
    if (record.length > 1 || record[0] !== "") {
      records.push(record);
    }
    record = [];
  };

  while (index < text.length) {
    const char = text[index];
    if (quoted) {
      if (char === '"' && text[index + 1] === '"') {
        field += '"';
        index += 2;
        continue;
      }
      if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }

    if (char === '"' && field === "") {
      quoted = true;
    } else if (char === ",") {
      endField();
    } else if (char === "\r" && text[index + 1] === "\n") {
      endRecord();
      index += 1;
    } else if (char === "\n" || char === "\r") {
      endRecord();
    } else {
      field += char;
    }
    index += 1;
  }

  if (quoted) {
    throw new Error("unterminated quoted field");
  }
  if (field !== "" || record.length > 0) {
    endRecord();
  }
  return records;
};

const parseCount = (raw: string, column: string, line: number): number => {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`line ${line}: ${column} must be a non-negative integer`);
  }
  return Number(raw.trim());
};

export const parseSeriesCsv = (text: string): Series => {
  const [header, ...rows] = parseRecords(text);
  if (!header || header[0] !== "date" || header[1] !== "total") {
    throw new Error("CFD file must start with a date,total header");
  }

  const statuses = header.slice(2);
  return rows.map((row, rowIndex) => {
    const line = rowIndex + 2;
    if (row.length !== header.length) {
      throw new Error(
        `line ${line}: expected ${header.length} fields, got ${row.length}`,
      );
    }

    const date = normalizeInstant(row[0] ?? "");
    if (!date.ok) {
      throw new Error(`line ${line}: ${date.reason}`);
    }

    const counts = statuses
      .map((name, offset): [string, number] => [
        name,
        parseCount(row[offset + 2] ?? "", name, line),
      ])
      .filter(([, count]) => count > 0);

    return {
      date: date.instant,
      counts: Object.fromEntries(counts),
      total: parseCount(row[1] ?? "", "total", line),
    };
  });
};

export const loadSeriesFile = (file: string): Series =>
  parseSeriesCsv(fs.readFileSync(file, "utf8"));

export const buildSeriesFileName = (input: {
  projectSlug: string;
  granularity: Granularity;
  now: Date;
  runId: RunId;
}): string => {
  const slug = input.projectSlug.replace(/[^A-Za-z0-9._-]+/g, "-");
  return `cfd_data_${slug}_${input.granularity}_${formatTimestamp(input.now)}_${input.runId}.csv`;
};

/** Newest `cfd_data_*.csv` in `dir` by modification time. */
export const findLatestSeriesFile = (dir: string): string | null => {
  if (!fs.existsSync(dir)) {
    return null;
  }

  const candidates = fs
    .readdirSync(dir)
    .filter((entry) => minimatch(entry, SERIES_FILE_GLOB))
    .map((entry) => {
      const file = path.join(dir, entry);
      return { file, mtimeMs: fs.statSync(file).mtimeMs };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs || b.file.localeCompare(a.file));

  return candidates[0]?.file ?? null;
};
