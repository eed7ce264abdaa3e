/**
 * Worker
 *
 * One async worker that:
 * 1. Claims tasks from the queue
 * 2. Runs the paginated query for each
 * 3. Hands the result to the sink
 * 4. Returns when the queue is drained
 */

import chalk from "chalk";
import type { SearchClient } from "../search/serpapi-client.js";
import { errorMessage } from "../types/errors.js";
import { scopedLogger } from "../utils/logger.js";
import { executeQuery } from "./query-executor.js";
import type { ResultSink } from "./result-sink.js";
import type { TaskQueue } from "./task-queue.js";
import type {
  ExecutorOptions,
  QueryResult,
  RecordOutcome,
  WorkerResult,
} from "./types.js";

export interface WorkerContext {
  queue: TaskQueue;
  client: SearchClient;
  sink: ResultSink;
  executor: ExecutorOptions;
  /** Called right before and after a task executes; used for accounting. */
  onTaskStart?: () => void;
  onTaskEnd?: () => void;
  onResult?: (result: QueryResult, outcome: RecordOutcome) => void;
}

export async function runWorker(
  workerId: string,
  context: WorkerContext,
): Promise<WorkerResult> {
  const log = scopedLogger(workerId);
  const result: WorkerResult = {
    workerId,
    tasksProcessed: 0,
    tasksSucceeded: 0,
    tasksFailed: 0,
    errors: [],
  };

  log.debug(chalk.gray("Started"));

  while (true) {
    const task = context.queue.claimNext(workerId);
    if (!task) {
      break;
    }

    result.tasksProcessed++;
    log.debug(chalk.gray(`Processing: [${task.category}] ${task.queryTemplate}`));

    context.onTaskStart?.();
    try {
      const queryResult = await executeQuery(
        task,
        context.client,
        context.executor,
        log,
      );
      const outcome = await context.sink.record(queryResult);
      context.onResult?.(queryResult, outcome);
      context.queue.markComplete(task.id);
      result.tasksSucceeded++;

      log.debug(
        chalk.green(
          `Completed: ${task.category} → ${outcome.totalUrls} URLs (${outcome.newUrls} new)`,
        ),
      );
    } catch (error) {
      // The task counts as an empty result; the pool keeps going.
      const message = errorMessage(error);
      context.queue.markFailed(task.id, message);
      result.tasksFailed++;
      result.errors.push(`${task.id}: ${message}`);
      log.error(chalk.red(`Task ${task.id} failed: ${message}`));
    } finally {
      context.onTaskEnd?.();
    }
  }

  log.debug(
    chalk.gray(
      `Finished: ${result.tasksSucceeded} succeeded, ${result.tasksFailed} failed`,
    ),
  );

  return result;
}
