import { z } from "zod";
import { REQUEST_TIMEOUT_MS, SERPAPI_ACCOUNT_URL } from "../types/constants.js";
import { SearchRequestError, errorMessage } from "../types/errors.js";
import {
  type FetchLike,
  isTimeoutError,
  readErrorBody,
} from "./serpapi-client.js";

export interface AccountStatus {
  quota: number;
  used: number;
}

export interface AccountClient {
  getAccountStatus(): Promise<AccountStatus>;
}

const accountResponseSchema = z.object({
  searches_per_month: z.number().int().nonnegative(),
  this_month_usage: z.number().int().nonnegative(),
});

export interface SerpApiAccountClientOptions {
  apiKey: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Reads the monthly allotment and usage from SerpApi's account endpoint.
 * This endpoint is free; it does not consume search credits.
 */
export class SerpApiAccountClient implements AccountClient {
  private apiKey: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: SerpApiAccountClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getAccountStatus(): Promise<AccountStatus> {
    const url = new URL(SERPAPI_ACCOUNT_URL);
    url.searchParams.set("api_key", this.apiKey);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SearchRequestError(
        isTimeoutError(error) ? "timeout" : "network",
        `Account status request failed: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      const detail = await readErrorBody(response);
      throw new SearchRequestError(
        "http",
        `Account status HTTP ${response.status}: ${detail}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SearchRequestError(
        "api",
        `Invalid JSON in account status: ${errorMessage(error)}`,
        response.status,
        { cause: error },
      );
    }

    const parsed = accountResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchRequestError(
        "api",
        "Account status response is missing usage counters",
        response.status,
      );
    }

    return {
      quota: parsed.data.searches_per_month,
      used: parsed.data.this_month_usage,
    };
  }
}
