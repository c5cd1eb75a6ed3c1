export type Brand<T, B extends string> = T & { readonly __brand: B };

export type RunId = Brand<string, "RunId">;

export const asRunId = (value: string): RunId => value as RunId;

export type StatusId = number;

export type Granularity = "daily" | "weekly" | "monthly";

export const GRANULARITIES: readonly Granularity[] = [
  "daily",
  "weekly",
  "monthly",
];

/** Anything the date helpers can turn into a UTC instant. */
export type InstantInput = string | number | Date;

export interface StoryRecord {
  id: number;
  created_at?: InstantInput | null;
  status_id: StatusId | null;
}

export interface StatusEntry {
  id: StatusId;
  name: string;
  is_closed?: boolean;
}

export type StatusCatalog = ReadonlyMap<StatusId, string>;

export interface DateWindow {
  start: Date;
  end: Date;
}

export interface BucketSnapshot {
  /** Start of the bucket. */
  date: Date;
  /** Only statuses with a positive count appear. */
  counts: Readonly<Record<string, number>>;
  total: number;
}

export type Series = readonly BucketSnapshot[];

export type WarningSink = (message: string) => void;

export const createStatusCatalog = (
  statuses: readonly StatusEntry[],
): StatusCatalog => new Map(statuses.map((status) => [status.id, status.name]));

export const statusName = (catalog: StatusCatalog, id: StatusId): string =>
  catalog.get(id) ?? `Status ${id}`;
