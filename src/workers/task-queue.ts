import type {
  QueueProgress,
  Task,
  TaskRecord,
  TaskStatus,
} from "./types.js";

/**
 * Task Queue
 *
 * In-process queue the workers claim tasks from. Claims are synchronous, so
 * two workers can never take the same task between event-loop turns.
 */
export class TaskQueue {
  private tasks: TaskRecord[];
  private nextIndex: number;

  constructor(tasks: Task[] = []) {
    this.tasks = [];
    this.nextIndex = 0;
    this.insertTasks(tasks);
  }

  /**
   * Append tasks in the pending state.
   */
  insertTasks(tasks: Task[]): void {
    for (const task of tasks) {
      this.tasks.push({
        ...task,
        status: 0,
        workerId: null,
        startedAt: null,
        completedAt: null,
        error: null,
      });
    }
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Claim the next pending task, or null when nothing is left.
   */
  claimNext(workerId: string): TaskRecord | null {
    while (this.nextIndex < this.tasks.length) {
      const record = this.tasks[this.nextIndex++];
      if (record && record.status === 0) {
        record.status = 1;
        record.workerId = workerId;
        record.startedAt = Date.now();
        return record;
      }
    }
    return null;
  }

  markComplete(taskId: string): void {
    this.finish(taskId, 2, null);
  }

  markFailed(taskId: string, error: string): void {
    this.finish(taskId, 3, error);
  }

  private finish(taskId: string, status: TaskStatus, error: string | null) {
    const record = this.tasks.find((task) => task.id === taskId);
    if (!record) {
      throw new Error(`Unknown task: ${taskId}`);
    }
    record.status = status;
    record.completedAt = Date.now();
    record.error = error;
  }

  getProgress(): QueueProgress {
    const progress: QueueProgress = {
      total: this.tasks.length,
      pending: 0,
      inProgress: 0,
      completed: 0,
      failed: 0,
    };
    for (const task of this.tasks) {
      switch (task.status) {
        case 0:
          progress.pending++;
          break;
        case 1:
          progress.inProgress++;
          break;
        case 2:
          progress.completed++;
          break;
        case 3:
          progress.failed++;
          break;
      }
    }
    return progress;
  }

  isComplete(): boolean {
    return this.tasks.every((task) => task.status === 2 || task.status === 3);
  }

  getFailedTasks(): TaskRecord[] {
    return this.tasks.filter((task) => task.status === 3);
  }
}
