import chalk from "chalk";
import type { SearchClient } from "../search/serpapi-client.js";
import { logger } from "../utils/logger.js";
import type { ResultSink } from "./result-sink.js";
import type { TaskQueue } from "./task-queue.js";
import type {
  ExecutorOptions,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
} from "./types.js";
import { runWorker } from "./worker.js";

/**
 * Worker Pool Manager
 *
 * Runs a fixed group of async workers over the task queue. Never starts more
 * workers than there are tasks.
 */
export class WorkerPool {
  private queue: TaskQueue;
  private workerCount: number;
  private client: SearchClient;
  private sink: ResultSink;
  private executor: ExecutorOptions;
  private options: WorkerPoolOptions;
  private running: Promise<WorkerResult[]> | null;
  private active: number;
  private peakActive: number;

  constructor(
    queue: TaskQueue,
    workerCount: number,
    client: SearchClient,
    sink: ResultSink,
    executor: ExecutorOptions,
    options: WorkerPoolOptions = {},
  ) {
    this.queue = queue;
    this.workerCount =
      queue.size === 0 ? 0 : Math.max(1, Math.min(workerCount, queue.size));
    this.client = client;
    this.sink = sink;
    this.executor = executor;
    this.options = options;
    this.running = null;
    this.active = 0;
    this.peakActive = 0;
  }

  get size(): number {
    return this.workerCount;
  }

  /**
   * Start all workers
   */
  start(): void {
    if (this.running) {
      return;
    }

    if (this.options.verbose) {
      logger.debug(chalk.blue(`Starting ${this.workerCount} workers...`));
    }

    const workers: Promise<WorkerResult>[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      workers.push(
        runWorker(`worker-${i + 1}`, {
          queue: this.queue,
          client: this.client,
          sink: this.sink,
          executor: this.executor,
          onTaskStart: () => {
            this.active++;
            this.peakActive = Math.max(this.peakActive, this.active);
          },
          onTaskEnd: () => {
            this.active--;
            this.options.onProgress?.(this.queue.getProgress());
          },
          onResult: this.options.onResult,
        }),
      );
    }
    this.running = Promise.all(workers);
  }

  /**
   * Wait for all workers to complete
   */
  async waitForCompletion(): Promise<WorkerPoolResult> {
    if (!this.running) {
      this.start();
    }
    const results = this.running ? await this.running : [];

    const result: WorkerPoolResult = {
      totalWorkers: this.workerCount,
      tasksCompleted: 0,
      tasksFailed: 0,
      peakActive: this.peakActive,
    };
    for (const workerResult of results) {
      result.tasksCompleted += workerResult.tasksSucceeded;
      result.tasksFailed += workerResult.tasksFailed;
    }

    if (this.options.verbose) {
      logger.debug(
        chalk.green(
          `✓ All workers completed: ${result.tasksCompleted} tasks succeeded, ${result.tasksFailed} failed`,
        ),
      );
    }

    return result;
  }

  /**
   * Start, then wait.
   */
  async run(): Promise<WorkerPoolResult> {
    this.start();
    return this.waitForCompletion();
  }
}
