import { describe, expect, it, vi } from "vitest";
import { SerpApiAccountClient } from "../src/search/account-client.js";
import {
  type FetchLike,
  SerpApiClient,
  extractUrls,
} from "../src/search/serpapi-client.js";
import { SearchRequestError } from "../src/types/errors.js";

/**
 * Helper to build a JSON response
 */
function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function stubFetch(respond: () => Promise<Response>) {
  return vi.fn<FetchLike>(async () => respond());
}

describe("extractUrls", () => {
  it("collects links from organic results, sitelinks, news and top stories", () => {
    const urls = extractUrls({
      organic_results: [
        {
          link: "https://target.test/",
          sitelinks: {
            inline: [{ link: "https://target.test/about" }],
            expanded: [{ link: "https://target.test/careers" }, {}],
          },
        },
        { link: "https://target.test/" },
        {},
      ],
      news_results: [{ link: "https://news.test/story" }],
      top_stories: [{ link: "https://news.test/top" }],
    });

    expect([...urls].sort()).toEqual([
      "https://news.test/story",
      "https://news.test/top",
      "https://target.test/",
      "https://target.test/about",
      "https://target.test/careers",
    ]);
  });

  it("returns an empty set when no section is present", () => {
    expect(extractUrls({}).size).toBe(0);
  });
});

describe("SerpApiClient", () => {
  it("sends the query, offset and paging parameters", async () => {
    const fetch = stubFetch(async () =>
      jsonResponse({ organic_results: [{ link: "https://target.test/x" }] }),
    );
    const client = new SerpApiClient({ apiKey: "test-key", fetch });

    const data = await client.search("site:target.test ext:pdf", 100);

    expect(data.organic_results).toEqual([{ link: "https://target.test/x" }]);
    const [requested] = fetch.mock.calls[0] ?? [];
    const url = new URL(String(requested));
    expect(url.origin + url.pathname).toBe("https://serpapi.com/search");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      engine: "google",
      q: "site:target.test ext:pdf",
      num: "100",
      start: "100",
      api_key: "test-key",
    });
  });

  it("classifies non-success statuses as http failures", async () => {
    const fetch = stubFetch(async () =>
      jsonResponse({ error: "Invalid API key." }, 401),
    );
    const client = new SerpApiClient({ apiKey: "test-key", fetch });

    const attempt = client.search("q", 0);

    await expect(attempt).rejects.toBeInstanceOf(SearchRequestError);
    await expect(attempt).rejects.toMatchObject({
      kind: "http",
      status: 401,
      message: "HTTP 401: Invalid API key.",
    });
  });

  it("classifies thrown fetch errors as network failures", async () => {
    const fetch = stubFetch(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new SerpApiClient({ apiKey: "test-key", fetch });

    await expect(client.search("q", 0)).rejects.toMatchObject({
      kind: "network",
      message: "fetch failed",
    });
  });

  it("classifies aborted requests as timeouts", async () => {
    const fetch = stubFetch(async () => {
      const error = new Error("The operation was aborted due to timeout");
      error.name = "TimeoutError";
      throw error;
    });
    const client = new SerpApiClient({
      apiKey: "test-key",
      fetch,
      timeoutMs: 50,
    });

    await expect(client.search("q", 0)).rejects.toMatchObject({
      kind: "timeout",
      message: "Request timed out after 50ms",
    });
  });

  it("rejects bodies that do not match the result schema", async () => {
    const fetch = stubFetch(async () =>
      jsonResponse({ organic_results: "nope" }),
    );
    const client = new SerpApiClient({ apiKey: "test-key", fetch });

    await expect(client.search("q", 0)).rejects.toMatchObject({ kind: "api" });
  });
});

describe("SerpApiAccountClient", () => {
  it("maps the account counters to quota and used", async () => {
    const fetch = stubFetch(async () =>
      jsonResponse({
        account_email: "ops@example.org",
        searches_per_month: 250,
        this_month_usage: 42,
        plan_searches_left: 208,
      }),
    );
    const client = new SerpApiAccountClient({ apiKey: "test-key", fetch });

    await expect(client.getAccountStatus()).resolves.toEqual({
      quota: 250,
      used: 42,
    });
    const [requested] = fetch.mock.calls[0] ?? [];
    expect(String(requested)).toBe(
      "https://serpapi.com/account?api_key=test-key",
    );
  });

  it("fails when the counters are missing", async () => {
    const fetch = stubFetch(async () => jsonResponse({ plan_name: "Free" }));
    const client = new SerpApiAccountClient({ apiKey: "test-key", fetch });

    await expect(client.getAccountStatus()).rejects.toMatchObject({
      kind: "api",
    });
  });
});
