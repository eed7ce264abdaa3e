import chalk from "chalk";
import type { DorkCategories } from "../dorks/dork-file.js";
import { LiveUsagePoller } from "../quota/live-poller.js";
import { type QuotaStore, RemoteQuotaSource } from "../quota/quota-store.js";
import {
  type RunPlan,
  computeRunPlan,
  creditsFor,
  enforceHardCap,
  formatPercent,
} from "../quota/run-plan.js";
import type { AccountClient } from "../search/account-client.js";
import type { SearchClient } from "../search/serpapi-client.js";
import { DEFAULT_POLL_INTERVAL_SECONDS } from "../types/constants.js";
import { ConfigurationError } from "../types/errors.js";
import { showRunPlan, showSummary } from "../utils/helpers.js";
import { logger } from "../utils/logger.js";
import { ResultSink } from "./result-sink.js";
import { TaskQueue } from "./task-queue.js";
import type {
  CoordinatorOptions,
  CoordinatorResult,
  QueryResult,
  Task,
  WorkerPoolResult,
} from "./types.js";
import { WorkerPool } from "./worker-pool.js";

/**
 * Cross product of domains × categories × templates, in that nesting order.
 */
export function buildTasks(
  domains: string[],
  categories: DorkCategories,
): Task[] {
  const tasks: Task[] = [];
  for (const domain of domains) {
    for (const [category, templates] of categories) {
      for (const queryTemplate of templates) {
        tasks.push({
          id: `task-${tasks.length + 1}`,
          domain,
          category,
          queryTemplate,
        });
      }
    }
  }
  return tasks;
}

function addTo(
  breakdown: Map<string, Set<string>>,
  key: string,
  result: QueryResult,
): void {
  let urls = breakdown.get(key);
  if (!urls) {
    urls = new Set();
    breakdown.set(key, urls);
  }
  for (const url of result.urls) {
    urls.add(url);
  }
}

function countSizes(
  breakdown: Map<string, Set<string>>,
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const [key, urls] of breakdown) {
    counts[key] = urls.size;
  }
  return counts;
}

/**
 * Coordinator
 *
 * Runs one dispatch:
 * 1. Expands the task list
 * 2. Counts credits needed and enforces the hard cap
 * 3. Resolves quota and prior usage (local file or account endpoint)
 * 4. Computes and shows the run plan
 * 5. Asks for confirmation
 * 6. Runs the worker pool (optionally polling live usage)
 * 7. Charges the planned credits and reports totals
 */
export class Coordinator {
  private categories: DorkCategories;
  private client: SearchClient;
  private quotaStore: QuotaStore;
  private accountClient: AccountClient | null;
  private options: CoordinatorOptions;
  private startTime: number;

  constructor(
    categories: DorkCategories,
    client: SearchClient,
    quotaStore: QuotaStore,
    options: CoordinatorOptions,
    accountClient: AccountClient | null = null,
  ) {
    this.categories = categories;
    this.client = client;
    this.quotaStore = quotaStore;
    this.accountClient = accountClient;
    this.options = options;
    this.startTime = Date.now();
  }

  async run(): Promise<CoordinatorResult> {
    this.startTime = Date.now();

    // Phase 1: Expand tasks
    const domains = this.options.domains.filter((domain) => domain.length > 0);
    if (domains.length === 0) {
      throw new ConfigurationError("No target domain given");
    }
    const tasks = buildTasks(domains, this.categories);
    if (tasks.length === 0) {
      throw new ConfigurationError("The dork source contains no templates");
    }

    // Phase 2: Credits and hard cap, before any request
    const creditsNeeded = creditsFor(tasks.length, this.options.pages);
    logger.info(
      chalk.white(
        `[i] ${tasks.length} dorks × ${this.options.pages} pages = ${creditsNeeded} credits`,
      ),
    );
    enforceHardCap(creditsNeeded, this.options.hardCap);

    // Phase 3: Quota and prior usage
    const { quota, usedBefore } = await this.resolveUsage();

    // Phase 4: Plan
    const plan = computeRunPlan({
      quota,
      usedBefore,
      taskCount: tasks.length,
      pagesPerTask: this.options.pages,
      hardCap: this.options.hardCap,
    });
    showRunPlan(plan);
    this.options.onPlan?.(plan);

    if (plan.exceedsQuota) {
      logger.warn(
        chalk.yellow(
          `⚠ This run would take usage to ${formatPercent(plan.projectedPercent)} of the monthly quota`,
        ),
      );
    }

    // Phase 5: Confirmation
    const confirmed = await this.options.confirm(plan);
    if (!confirmed) {
      logger.info(chalk.gray("Aborted."));
      return this.emptyResult(plan, tasks.length);
    }

    // Phase 6: Dispatch
    const sink = new ResultSink(this.options.outputDir, {
      csv: this.options.csv,
    });
    const queue = new TaskQueue(tasks);
    const perDomain = new Map<string, Set<string>>();
    const perCategory = new Map<string, Set<string>>();
    const pool = new WorkerPool(
      queue,
      this.options.workers,
      this.client,
      sink,
      {
        pages: this.options.pages,
        delayMs: this.options.delayMs,
        retries: this.options.retries,
        backoffBase: this.options.backoffBase,
        sleep: this.options.sleep,
      },
      {
        verbose: this.options.verbose,
        onProgress: this.options.onProgress,
        onResult: (result) => {
          addTo(perDomain, result.domain, result);
          addTo(perCategory, result.category, result);
        },
      },
    );

    const poller = this.createPoller();
    poller?.start();

    let poolResult: WorkerPoolResult;
    try {
      poolResult = await pool.run();
    } finally {
      await poller?.stop();
    }

    // Phase 7: Charge credits for every planned request
    const saved = this.quotaStore.save(plan.projectedUsed);

    const result: CoordinatorResult = {
      aborted: false,
      plan,
      tasks: tasks.length,
      tasksFailed: poolResult.tasksFailed,
      workersUsed: poolResult.totalWorkers,
      totalUniqueUrls: sink.snapshot().combined,
      perCategory: countSizes(perCategory),
      perDomain: countSizes(perDomain),
      usedAfter: saved.used,
      duration: Date.now() - this.startTime,
    };

    showSummary(result);
    return result;
  }

  private async resolveUsage(): Promise<{ quota: number; usedBefore: number }> {
    if (this.options.autoQuota) {
      if (!this.accountClient) {
        throw new ConfigurationError(
          "Quota auto-detect needs an account-status client",
        );
      }
      const status = await new RemoteQuotaSource(this.accountClient).fetch();
      logger.info(
        chalk.gray(
          `Account reports ${status.used}/${status.quota} credits used this month`,
        ),
      );
      return { quota: status.quota, usedBefore: status.used };
    }

    const usedBefore =
      this.options.usedOverride ?? this.quotaStore.load().used;
    return { quota: this.options.quota, usedBefore };
  }

  private createPoller(): LiveUsagePoller | null {
    if (!this.options.livePoll) {
      return null;
    }
    if (!this.accountClient) {
      logger.warn(
        chalk.yellow("Live polling requested without an account client"),
      );
      return null;
    }
    return new LiveUsagePoller(this.accountClient, {
      intervalMs:
        this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_SECONDS * 1000,
      minIntervalMs: this.options.minPollIntervalMs,
      onSample: this.options.onLiveUsage,
    });
  }

  private emptyResult(plan: RunPlan, taskCount: number): CoordinatorResult {
    return {
      aborted: true,
      plan,
      tasks: taskCount,
      tasksFailed: 0,
      workersUsed: 0,
      totalUniqueUrls: 0,
      perCategory: {},
      perDomain: {},
      usedAfter: plan.usedBefore,
      duration: Date.now() - this.startTime,
    };
  }
}
