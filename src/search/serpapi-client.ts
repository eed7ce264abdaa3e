import { z } from "zod";
import {
  REQUEST_TIMEOUT_MS,
  RESULTS_PER_PAGE,
  SERPAPI_SEARCH_URL,
} from "../types/constants.js";
import { SearchRequestError, errorMessage } from "../types/errors.js";

const linkedResultSchema = z.object({
  link: z.string().optional(),
});

const organicResultSchema = linkedResultSchema.extend({
  sitelinks: z
    .object({
      inline: z.array(linkedResultSchema).optional(),
      expanded: z.array(linkedResultSchema).optional(),
    })
    .optional(),
});

export const searchResultSetSchema = z.object({
  organic_results: z.array(organicResultSchema).optional(),
  news_results: z.array(linkedResultSchema).optional(),
  top_stories: z.array(linkedResultSchema).optional(),
});

/** The parts of a SerpApi Google response that carry result links. */
export type SearchResultSet = z.infer<typeof searchResultSetSchema>;

/**
 * A paginated, per-request-billed search provider.
 * Implementations throw `SearchRequestError` on any failed request.
 */
export interface SearchClient {
  search(query: string, offset: number): Promise<SearchResultSet>;
}

export type FetchLike = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>;

export interface SerpApiClientOptions {
  apiKey: string;
  engine?: string;
  resultsPerPage?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Every link found in the primary results and in the auxiliary sections
 * (sitelinks, news, top stories).
 */
export function extractUrls(data: SearchResultSet): Set<string> {
  const urls = new Set<string>();
  const add = (link: string | undefined) => {
    if (link) {
      urls.add(link);
    }
  };

  for (const result of data.organic_results ?? []) {
    add(result.link);
    for (const sitelink of result.sitelinks?.inline ?? []) {
      add(sitelink.link);
    }
    for (const sitelink of result.sitelinks?.expanded ?? []) {
      add(sitelink.link);
    }
  }
  for (const result of data.news_results ?? []) {
    add(result.link);
  }
  for (const result of data.top_stories ?? []) {
    add(result.link);
  }

  return urls;
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Reads SerpApi's `{ "error": "..." }` body if there is one, for nicer
 * failure messages.
 */
export async function readErrorBody(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    const parsed = z.object({ error: z.string() }).safeParse(body);
    if (parsed.success) {
      return parsed.data.error;
    }
  } catch (error) {
    return `unreadable body (${errorMessage(error)})`;
  }
  return response.statusText;
}

export class SerpApiClient implements SearchClient {
  private apiKey: string;
  private engine: string;
  private resultsPerPage: number;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: SerpApiClientOptions) {
    this.apiKey = options.apiKey;
    this.engine = options.engine ?? "google";
    this.resultsPerPage = options.resultsPerPage ?? RESULTS_PER_PAGE;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, offset: number): Promise<SearchResultSet> {
    const url = new URL(SERPAPI_SEARCH_URL);
    url.search = new URLSearchParams({
      engine: this.engine,
      q: query,
      num: String(this.resultsPerPage),
      start: String(offset),
      api_key: this.apiKey,
    }).toString();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new SearchRequestError(
          "timeout",
          `Request timed out after ${this.timeoutMs}ms`,
          undefined,
          { cause: error },
        );
      }
      throw new SearchRequestError("network", errorMessage(error), undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = await readErrorBody(response);
      throw new SearchRequestError(
        "http",
        `HTTP ${response.status}: ${detail}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SearchRequestError(
        "api",
        `Invalid JSON in search response: ${errorMessage(error)}`,
        response.status,
        { cause: error },
      );
    }

    const parsed = searchResultSetSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchRequestError(
        "api",
        `Unexpected search response shape: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        response.status,
      );
    }
    return parsed.data;
  }
}
