import { HardCapError } from "../types/errors.js";

export interface RunPlan {
  quota: number;
  usedBefore: number;
  taskCount: number;
  pagesPerTask: number;
  /** One credit per page request: taskCount × pagesPerTask. */
  creditsNeeded: number;
  projectedUsed: number;
  projectedPercent: number;
  hardCap?: number;
  exceedsQuota: boolean;
}

export interface RunPlanInput {
  quota: number;
  usedBefore: number;
  taskCount: number;
  pagesPerTask: number;
  hardCap?: number;
}

/** One credit per page request. */
export function creditsFor(taskCount: number, pagesPerTask: number): number {
  return taskCount * pagesPerTask;
}

export function computeRunPlan(input: RunPlanInput): RunPlan {
  const creditsNeeded = creditsFor(input.taskCount, input.pagesPerTask);
  const projectedUsed = input.usedBefore + creditsNeeded;
  const projectedPercent =
    input.quota > 0 ? (projectedUsed / input.quota) * 100 : 0;

  return {
    quota: input.quota,
    usedBefore: input.usedBefore,
    taskCount: input.taskCount,
    pagesPerTask: input.pagesPerTask,
    creditsNeeded,
    projectedUsed,
    projectedPercent,
    hardCap: input.hardCap,
    exceedsQuota: projectedUsed > input.quota,
  };
}

/**
 * Throws when a hard cap is configured and the run would need more credits
 * than it allows. Needs no usage figures, so it can run before any lookup.
 * Going over the monthly quota alone is only a warning.
 */
export function enforceHardCap(creditsNeeded: number, hardCap?: number): void {
  if (hardCap !== undefined && creditsNeeded > hardCap) {
    throw new HardCapError(creditsNeeded, hardCap);
  }
}

export function formatPercent(percent: number): string {
  return `${percent.toFixed(1)}%`;
}
