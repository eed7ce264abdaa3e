import chalk from "chalk";
import { type RunPlan, formatPercent } from "../quota/run-plan.js";
import type { CoordinatorResult } from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import { logger } from "./logger.js";
import { closeProgressBars } from "./progress.js";

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function showHeader(version: string): void {
  logger.info(chalk.yellow(getAsciiArt("Dork Dispatch")));
  logger.info(
    chalk.yellow.bold(`SerpApi dork runner with quota tracking (v${version})\n`),
  );
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}

export interface ConfigurationView {
  domains: string[];
  dorksPath: string;
  categories: number;
  templates: number;
  outputDir: string;
  usageFile: string;
  pages: number;
  workers: number;
  delaySeconds: number;
  csv: boolean;
  autoQuota: boolean;
  livePoll: boolean;
  verbose: boolean;
}

export function showConfiguration(view: ConfigurationView): void {
  logger.info(chalk.cyan("\nCollected inputs:"));
  logger.info(chalk.white(`  Domains: ${view.domains.join(", ")}`));
  logger.info(
    chalk.white(
      `  Dorks: ${view.dorksPath} (${view.templates} templates in ${view.categories} categories)`,
    ),
  );
  logger.info(chalk.white(`  Output: ${view.outputDir}`));
  logger.info(chalk.white(`  Usage file: ${view.usageFile}`));
  logger.info(chalk.white(`  Pages per dork: ${view.pages}`));
  logger.info(chalk.white(`  Workers: ${view.workers}`));
  logger.info(chalk.white(`  Delay: ${view.delaySeconds}s`));
  logger.info(chalk.white(`  CSV: ${view.csv ? "Yes" : "No"}`));
  logger.info(
    chalk.white(
      `  Quota source: ${view.autoQuota ? "account endpoint" : "local usage file"}`,
    ),
  );
  if (view.livePoll) {
    logger.info(chalk.white("  Live usage polling: Yes"));
  }
  logger.info(chalk.white(`  Verbose: ${view.verbose ? "Yes" : "No"}`));
}

export function showRunPlan(plan: RunPlan): void {
  logger.info(chalk.cyan("\nRun plan:"));
  logger.info(chalk.white(`  [i] Monthly Quota : ${plan.quota}`));
  logger.info(chalk.white(`  [i] Used Before   : ${plan.usedBefore}`));
  logger.info(
    chalk.white(
      `  [i] This Run Uses : ${plan.creditsNeeded} (${plan.taskCount} dorks × ${plan.pagesPerTask} pages)`,
    ),
  );
  const after = `  [i] After Run     : ${plan.projectedUsed} (${formatPercent(plan.projectedPercent)})`;
  logger.info(plan.exceedsQuota ? chalk.red(after) : chalk.white(after));
  if (plan.hardCap !== undefined) {
    logger.info(chalk.white(`  [i] Hard Cap      : ${plan.hardCap}`));
  }
  logger.info("");
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}

function boxLine(text: string): string {
  return `║ ${text.padEnd(48)} ║`;
}

export function showSummary(result: CoordinatorResult): void {
  const { plan } = result;
  logger.info(chalk.white("\n╔══════════════════════════════════════════════════╗"));
  logger.info(chalk.white("║                     SUMMARY                      ║"));
  logger.info(chalk.white("╠══════════════════════════════════════════════════╣"));
  logger.info(chalk.white(boxLine("Dorks")));
  logger.info(chalk.white(boxLine(`  Total: ${result.tasks}`)));
  logger.info(
    result.tasksFailed > 0
      ? chalk.red(boxLine(`  ✗ Failed: ${result.tasksFailed}`))
      : chalk.white(boxLine("  ✗ Failed: 0")),
  );
  logger.info(chalk.white(boxLine(`  Workers Used: ${result.workersUsed}`)));
  logger.info(chalk.white(boxLine("")));
  logger.info(chalk.white(boxLine("URLs")));
  logger.info(chalk.green(boxLine(`  ✓ Unique: ${result.totalUniqueUrls}`)));
  for (const [domain, count] of Object.entries(result.perDomain)) {
    logger.info(chalk.white(boxLine(`  ${domain}: ${count}`)));
  }
  for (const [category, count] of Object.entries(result.perCategory)) {
    logger.info(chalk.gray(boxLine(`  [${category}] ${count}`)));
  }
  logger.info(chalk.white(boxLine("")));
  logger.info(chalk.white(boxLine("Credits")));
  logger.info(
    chalk.white(
      boxLine(
        `  Used: ${result.usedAfter}/${plan.quota} (${formatPercent(plan.projectedPercent)})`,
      ),
    ),
  );
  logger.info(
    chalk.white(boxLine(`  Duration: ${formatDuration(result.duration)}`)),
  );
  logger.info(chalk.white("╚══════════════════════════════════════════════════╝"));
  logger.info("");
}
