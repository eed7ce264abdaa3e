import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import type { QueueProgress } from "../workers/types.js";

export const DORK_PROGRESS_TASK = "Dorks";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Dork Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Add the dork progress bar (Green)
 */
export function addDorkProgressTask(totalDorks: number): void {
  const bars = initProgressBars();
  bars.addTask(DORK_PROGRESS_TASK, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: `0/${totalDorks} dorks`,
  });
}

/**
 * Update dork progress from queue counters; failed tasks count as done.
 */
export function updateDorkProgress(progress: QueueProgress): void {
  if (!mpb || progress.total === 0) return;
  const done = progress.completed + progress.failed;
  const failed = progress.failed > 0 ? chalk.red(` (${progress.failed} failed)`) : "";
  mpb.updateTask(DORK_PROGRESS_TASK, {
    percentage: done / progress.total,
    message: `${done}/${progress.total} dorks${failed}`,
  });
}

/**
 * Show the latest live usage sample next to the bar.
 */
export function updateLiveUsage(used: number, quota: number): void {
  if (!mpb) return;
  mpb.updateTask(DORK_PROGRESS_TASK, {
    message: `live usage ${used}/${quota}`,
  });
}

/**
 * Mark the dork bar as done
 */
export function markDorksDone(message?: string): void {
  if (!mpb) return;
  mpb.done(DORK_PROGRESS_TASK, {
    message: message || "Complete",
    barTransformFn: chalk.gray,
  });
}
