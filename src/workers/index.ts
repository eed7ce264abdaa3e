/**
 * Dispatch Module
 *
 * Bounded worker pool over a queue of dork tasks.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator(categories, client, quotaStore, {
 *     domains: ["example.org"],
 *     outputDir: "./output",
 *     pages: 2,
 *     workers: 8,
 *     delayMs: 800,
 *     quota: 250,
 *     confirm: async () => true,
 *   });
 *
 *   await coordinator.run();
 */

// Main classes
export { Coordinator, buildTasks } from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { TaskQueue } from "./task-queue.js";
export { ResultSink } from "./result-sink.js";

// Worker functions
export { runWorker } from "./worker.js";
export { executeQuery, nextPageState } from "./query-executor.js";

// Types
export type {
  Task,
  TaskRecord,
  TaskStatus,
  QueueProgress,
  QueryResult,
  ExecutorOptions,
  RecordOutcome,
  SinkSnapshot,
  CoordinatorOptions,
  CoordinatorResult,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
  ConfirmFn,
} from "./types.js";
