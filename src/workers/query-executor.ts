import chalk from "chalk";
import { substituteDomain } from "../dorks/dork-file.js";
import {
  extractUrls,
  type SearchClient,
} from "../search/serpapi-client.js";
import {
  BACKOFF_BASE,
  MAX_RETRIES,
  RESULTS_PER_PAGE,
} from "../types/constants.js";
import { errorMessage } from "../types/errors.js";
import { sleep as realSleep } from "../utils/helpers.js";
import { type Logger, logger as rootLogger } from "../utils/logger.js";
import type { ExecutorOptions, QueryResult, Task } from "./types.js";

/**
 * Lifecycle of one page request.
 *
 *   pending ──ok──▶ succeeded
 *   pending ──fail──▶ retrying(1) ──fail──▶ … retrying(retries) ──fail──▶ exhausted
 *   retrying(n) ──ok──▶ succeeded
 */
export type PageState =
  | { kind: "pending" }
  | { kind: "retrying"; attempt: number; lastError: string }
  | { kind: "succeeded"; urls: Set<string> }
  | { kind: "exhausted"; failures: number; lastError: string };

export type PageOutcome =
  | { ok: true; urls: Set<string> }
  | { ok: false; error: string };

export function nextPageState(
  state: PageState,
  outcome: PageOutcome,
  retries: number,
): PageState {
  if (state.kind === "succeeded" || state.kind === "exhausted") {
    return state;
  }
  if (outcome.ok) {
    return { kind: "succeeded", urls: outcome.urls };
  }
  const failures = state.kind === "retrying" ? state.attempt + 1 : 1;
  if (failures > retries) {
    return { kind: "exhausted", failures, lastError: outcome.error };
  }
  return { kind: "retrying", attempt: failures, lastError: outcome.error };
}

export function isTerminal(
  state: PageState,
): state is Extract<PageState, { kind: "succeeded" | "exhausted" }> {
  return state.kind === "succeeded" || state.kind === "exhausted";
}

/** Seconds → ms: base^attempt, i.e. 2s, 4s, 8s for base 2. */
export function backoffDelayMs(attempt: number, base: number): number {
  return Math.pow(base, attempt) * 1000;
}

/**
 * Runs every page of one task in order and unions the URLs they return.
 * Page failures are retried with exponential backoff and, once exhausted,
 * logged and skipped; this function does not throw for them.
 */
export async function executeQuery(
  task: Task,
  client: SearchClient,
  options: ExecutorOptions,
  log: Logger = rootLogger,
): Promise<QueryResult> {
  const retries = options.retries ?? MAX_RETRIES;
  const backoffBase = options.backoffBase ?? BACKOFF_BASE;
  const perPage = options.resultsPerPage ?? RESULTS_PER_PAGE;
  const sleep = options.sleep ?? realSleep;

  const query = substituteDomain(task.queryTemplate, task.domain);
  const result: QueryResult = {
    domain: task.domain,
    category: task.category,
    queryTemplate: task.queryTemplate,
    query,
    urls: new Set(),
    pagesSucceeded: 0,
    pagesFailed: 0,
  };

  for (let page = 0; page < options.pages; page++) {
    const offset = page * perPage;
    let state: PageState = { kind: "pending" };

    while (!isTerminal(state)) {
      if (state.kind === "retrying") {
        await sleep(backoffDelayMs(state.attempt, backoffBase));
      }

      let outcome: PageOutcome;
      try {
        const data = await client.search(query, offset);
        outcome = { ok: true, urls: extractUrls(data) };
      } catch (error) {
        outcome = { ok: false, error: errorMessage(error) };
      }

      state = nextPageState(state, outcome, retries);
      if (state.kind === "retrying") {
        log.debug(
          chalk.yellow(
            `Attempt ${state.attempt}/${retries + 1} failed for "${query}" (page=${page}): ${state.lastError}`,
          ),
        );
      }
    }

    if (state.kind === "succeeded") {
      result.pagesSucceeded++;
      for (const url of state.urls) {
        result.urls.add(url);
      }
    } else {
      result.pagesFailed++;
      log.warn(
        chalk.red(
          `Failed: "${query}" (page=${page}) after ${state.failures} attempts: ${state.lastError}`,
        ),
      );
    }

    await sleep(options.delayMs);
  }

  return result;
}
