import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { StatusEntry, StoryRecord } from "../core/types";
import {
  TaigaAuthSchema,
  TaigaPageSchema,
  type TaigaProject,
  TaigaProjectSchema,
  TaigaStatusListSchema,
  type TaigaStory,
  TaigaStorySchema,
  type TaigaUser,
  TaigaUserSchema,
} from "./schemas";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface TaigaClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface StoryPageEvent {
  page: number;
  received: number;
}

export interface ListStoriesOptions {
  pageSize: number;
  maxPages: number;
  onPage?: (event: StoryPageEvent) => void;
}

export interface StoryListing {
  stories: StoryRecord[];
  pages: number;
  /** Elements that did not look like a user story. */
  skipped: number;
  /** True when stories remain after the last page `maxPages` allowed. */
  truncated: boolean;
}

type Query = Record<string, string | number>;

export class TaigaApiError extends Error {
  constructor(
    readonly method: string,
    readonly route: string,
    readonly status: number,
    detail: string,
  ) {
    super(`Taiga ${method} ${route} failed (${status}): ${detail}`);
    this.name = "TaigaApiError";
  }
}

export const toStoryRecord = (story: TaigaStory): StoryRecord => ({
  id: story.id,
  created_at: story.created_date ?? null,
  status_id: story.status ?? null,
});

export class TaigaClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TaigaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  withToken(token: string): TaigaClient {
    return new TaigaClient({ ...this.options, token });
  }

  private url(route: string, query: Query = {}): string {
    const url = new URL(`${this.baseUrl}${route}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async send(
    method: "GET" | "POST",
    route: string,
    options: { query?: Query; body?: unknown } = {},
  ): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    return this.fetchImpl(this.url(route, options.query), {
      method,
      headers,
      ...(options.body === undefined
        ? {}
        : { body: JSON.stringify(options.body) }),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
    });
  }

  private async readJson<S extends TSchema>(
    method: "GET" | "POST",
    route: string,
    response: Response,
    schema: S,
  ): Promise<Static<S>> {
    if (!response.ok) {
      const text = await response.text();
      throw new TaigaApiError(
        method,
        route,
        response.status,
        text.slice(0, 200) || response.statusText,
      );
    }

    const data: unknown = await response.json();
    if (!Value.Check(schema, data)) {
      throw new TaigaApiError(
        method,
        route,
        response.status,
        "unexpected response shape",
      );
    }
    return data;
  }

  private async get<S extends TSchema>(
    route: string,
    schema: S,
    query?: Query,
  ): Promise<Static<S>> {
    const response = await this.send("GET", route, { query });
    return this.readJson("GET", route, response, schema);
  }

  /** Exchanges credentials for a token and fetches the user it belongs to. */
  async authenticate(
    username: string,
    password: string,
  ): Promise<{ authToken: string; user: TaigaUser }> {
    const route = "/api/v1/auth";
    const response = await this.send("POST", route, {
      body: { type: "normal", username, password },
    });
    const auth = await this.readJson("POST", route, response, TaigaAuthSchema);
    const user = await this.withToken(auth.auth_token).me();
    return { authToken: auth.auth_token, user };
  }

  async me(): Promise<TaigaUser> {
    return this.get("/api/v1/users/me", TaigaUserSchema);
  }

  async projectBySlug(slug: string): Promise<TaigaProject> {
    return this.get("/api/v1/projects/by_slug", TaigaProjectSchema, { slug });
  }

  async listStatuses(projectId: number): Promise<StatusEntry[]> {
    const statuses = await this.get(
      "/api/v1/userstory-statuses",
      TaigaStatusListSchema,
      { project: projectId },
    );
    return statuses.map((status) => ({
      id: status.id,
      name: status.name,
      ...(status.is_closed === undefined ? {} : { is_closed: status.is_closed }),
    }));
  }

  async listStories(
    projectId: number,
    options: ListStoriesOptions,
  ): Promise<StoryListing> {
    const route = "/api/v1/userstories";
    const stories: StoryRecord[] = [];
    let skipped = 0;
    let pages = 0;
    let exhausted = false;

    for (let page = 1; page <= options.maxPages; page += 1) {
      const response = await this.send("GET", route, {
        query: { project: projectId, page, page_size: options.pageSize },
      });

      // Taiga answers 404 for a page past the end.
      if (response.status === 404 && page > 1) {
        exhausted = true;
        break;
      }

      const items = await this.readJson(
        "GET",
        route,
        response,
        TaigaPageSchema,
      );
      pages = page;
      options.onPage?.({ page, received: items.length });

      for (const item of items) {
        if (Value.Check(TaigaStorySchema, item)) {
          stories.push(toStoryRecord(item));
        } else {
          skipped += 1;
        }
      }

      if (items.length < options.pageSize) {
        exhausted = true;
        break;
      }
    }

    const truncated = exhausted
      ? false
      : await this.hasStoriesAfter(route, projectId, options);
    return { stories, pages, skipped, truncated };
  }

  /**
   * Asks for the single story that follows the last full page; a page size
   * of 1 turns the story offset into the page number.
   */
  private async hasStoriesAfter(
    route: string,
    projectId: number,
    options: ListStoriesOptions,
  ): Promise<boolean> {
    const response = await this.send("GET", route, {
      query: {
        project: projectId,
        page: options.maxPages * options.pageSize + 1,
        page_size: 1,
      },
    });
    if (response.status === 404) {
      return false;
    }

    const items = await this.readJson("GET", route, response, TaigaPageSchema);
    return items.length > 0;
  }
}
