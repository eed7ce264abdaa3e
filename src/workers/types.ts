/**
 * Type definitions for the dork dispatch pipeline.
 */

import type { AccountStatus } from "../search/account-client.js";
import type { RunPlan } from "../quota/run-plan.js";

/**
 * One (domain, category, template) unit of work.
 */
export interface Task {
  readonly id: string;
  readonly domain: string;
  readonly category: string;
  readonly queryTemplate: string;
}

/**
 * Task status codes
 * 0 = Pending (not started)
 * 1 = In Progress (worker claimed it)
 * 2 = Completed
 * 3 = Failed (unexpected error, counted as an empty result)
 */
export type TaskStatus = 0 | 1 | 2 | 3;

export interface TaskRecord extends Task {
  status: TaskStatus;
  workerId: string | null;
  startedAt: number | null;
  completedAt: number | null;
  error: string | null;
}

export interface QueueProgress {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
}

/**
 * Everything one task discovered. Pages that exhausted their retries simply
 * contribute nothing.
 */
export interface QueryResult {
  domain: string;
  category: string;
  queryTemplate: string;
  query: string;
  urls: Set<string>;
  pagesSucceeded: number;
  pagesFailed: number;
}

export interface ExecutorOptions {
  pages: number;
  /** Pause after every page, in milliseconds. */
  delayMs: number;
  retries?: number;
  backoffBase?: number;
  resultsPerPage?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RecordOutcome {
  /** Lines appended to the category file. */
  newUrls: number;
  /** URLs carried by the recorded result. */
  totalUrls: number;
}

export interface SinkSnapshot {
  combined: number;
  perCategory: Record<string, number>;
}

export interface WorkerPoolOptions {
  verbose?: boolean;
  onProgress?: (progress: QueueProgress) => void;
  onResult?: (result: QueryResult, outcome: RecordOutcome) => void;
}

export interface WorkerPoolResult {
  totalWorkers: number;
  tasksCompleted: number;
  tasksFailed: number;
  /** Highest number of tasks that were executing at the same moment. */
  peakActive: number;
}

export interface WorkerResult {
  workerId: string;
  tasksProcessed: number;
  tasksSucceeded: number;
  tasksFailed: number;
  errors: string[];
}

export type ConfirmFn = (plan: RunPlan) => Promise<boolean>;

export interface CoordinatorOptions {
  domains: string[];
  outputDir: string;
  pages: number;
  workers: number;
  delayMs: number;
  quota: number;
  /** Overrides the stored usage for this month. */
  usedOverride?: number;
  hardCap?: number;
  csv?: boolean;
  autoQuota?: boolean;
  livePoll?: boolean;
  pollIntervalMs?: number;
  minPollIntervalMs?: number;
  verbose?: boolean;
  retries?: number;
  backoffBase?: number;
  sleep?: (ms: number) => Promise<void>;
  confirm: ConfirmFn;
  onPlan?: (plan: RunPlan) => void;
  onProgress?: (progress: QueueProgress) => void;
  onLiveUsage?: (status: AccountStatus) => void;
}

export interface CoordinatorResult {
  aborted: boolean;
  plan: RunPlan;
  tasks: number;
  tasksFailed: number;
  workersUsed: number;
  totalUniqueUrls: number;
  perCategory: Record<string, number>;
  perDomain: Record<string, number>;
  usedAfter: number;
  duration: number;
}
