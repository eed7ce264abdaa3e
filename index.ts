#!/usr/bin/env node
/**
 * Dork Dispatch CLI
 *
 * Runs categorized search dorks against one or more domains through SerpApi,
 * with a bounded worker pool, per-category and combined URL outputs, and a
 * monthly credit budget tracked across runs.
 *
 * @module index
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { type CliOptions, type DispatchConfig, resolveConfig } from "./src/config.js";
import { countTemplates, loadDorkFile } from "./src/dorks/dork-file.js";
import { QuotaStore } from "./src/quota/quota-store.js";
import { type RunPlan, formatPercent } from "./src/quota/run-plan.js";
import { SerpApiAccountClient } from "./src/search/account-client.js";
import { SerpApiClient } from "./src/search/serpapi-client.js";
import { DispatchError, errorMessage } from "./src/types/errors.js";
import {
  cleanupAfterPromptExit,
  showConfiguration,
  showHeader,
} from "./src/utils/helpers.js";
import {
  installConsoleBridge,
  logger,
  setVerboseMode,
} from "./src/utils/logger.js";
import {
  addDorkProgressTask,
  closeProgressBars,
  markDorksDone,
  updateDorkProgress,
  updateLiveUsage,
} from "./src/utils/progress.js";
import {
  isExitPromptError,
  promptConfirm,
  promptInput,
  promptSelect,
} from "./src/utils/prompt.js";
import { Coordinator } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS
// ============================================================================

function readVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // Source runs sit next to package.json; the build sits one level down.
  for (const candidate of [here, path.join(here, "..")]) {
    const packageJsonPath = path.join(candidate, "package.json");
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(
        fs.readFileSync(packageJsonPath, "utf-8"),
      );
      if (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
      ) {
        return packageJson.version;
      }
    }
  }
  return "0.0.0";
}

const VERSION = readVersion();

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Commander.js program instance */
const program = new Command();

installConsoleBridge();

// ============================================================================
// SECTION 3: INTERACTIVE FALLBACKS
// ============================================================================

const required = (label: string) => (value: string) =>
  value.trim() === "" ? `${label} is required` : true;

/**
 * Prompt for the inputs that have no default when they were not passed on
 * the command line or through the environment.
 */
async function fillMissingOptions(options: CliOptions): Promise<CliOptions> {
  const filled: CliOptions = { ...options };

  if (!filled.domain || filled.domain.length === 0) {
    const domain = await promptInput({
      message: "Target domain(s), comma-separated:",
      validate: required("Domain"),
      cleanup: cleanupAfterPromptExit,
    });
    filled.domain = [domain];
  }

  if (!filled.dorks) {
    filled.dorks = await promptInput({
      message: "Path to dork file:",
      default: "dorks.txt",
      validate: required("Dork file"),
      cleanup: cleanupAfterPromptExit,
    });
  }

  if (!filled.apikey && !process.env.SERPAPI_API_KEY) {
    filled.apikey = await promptInput({
      message: "SerpApi key:",
      validate: required("API key"),
      cleanup: cleanupAfterPromptExit,
    });
  }

  return filled;
}

/**
 * The operator gate: a plain yes/no normally, an explicit choice when the run
 * would go over the monthly quota.
 */
async function confirmPlan(plan: RunPlan): Promise<boolean> {
  if (plan.exceedsQuota) {
    const choice = await promptSelect({
      message: `Projected usage is ${formatPercent(plan.projectedPercent)} of the monthly quota. Continue?`,
      choices: [
        { name: "Abort", value: "abort" },
        { name: "Proceed anyway", value: "proceed" },
      ],
      default: "abort",
      cleanup: cleanupAfterPromptExit,
    });
    return choice === "proceed";
  }

  return promptConfirm({
    message: "Proceed?",
    default: true,
    cleanup: cleanupAfterPromptExit,
  });
}

// ============================================================================
// SECTION 4: MAIN APPLICATION
// ============================================================================

async function runDispatch(config: DispatchConfig): Promise<void> {
  const categories = loadDorkFile(config.dorksPath);

  showConfiguration({
    domains: config.domains,
    dorksPath: config.dorksPath,
    categories: categories.size,
    templates: countTemplates(categories),
    outputDir: config.outputDir,
    usageFile: config.usageFile,
    pages: config.pages,
    workers: config.workers,
    delaySeconds: config.delaySeconds,
    csv: config.csv,
    autoQuota: config.autoQuota,
    livePoll: config.livePoll,
    verbose: config.verbose,
  });

  const client = new SerpApiClient({ apiKey: config.apiKey });
  const accountClient =
    config.autoQuota || config.livePoll
      ? new SerpApiAccountClient({ apiKey: config.apiKey })
      : null;

  const coordinator = new Coordinator(
    categories,
    client,
    new QuotaStore(config.usageFile),
    {
      domains: config.domains,
      outputDir: config.outputDir,
      pages: config.pages,
      workers: config.workers,
      delayMs: config.delaySeconds * 1000,
      quota: config.quota,
      usedOverride: config.usedOverride,
      hardCap: config.hardCap,
      csv: config.csv,
      autoQuota: config.autoQuota,
      livePoll: config.livePoll,
      pollIntervalMs: config.pollIntervalSeconds * 1000,
      verbose: config.verbose,
      confirm: async (plan) => {
        const confirmed = config.assumeYes || (await confirmPlan(plan));
        if (confirmed) {
          addDorkProgressTask(plan.taskCount);
        }
        return confirmed;
      },
      onProgress: updateDorkProgress,
      onLiveUsage: (status) => updateLiveUsage(status.used, status.quota),
    },
    accountClient,
  );

  try {
    const result = await coordinator.run();
    if (!result.aborted) {
      markDorksDone(`${result.totalUniqueUrls} unique URLs ✓`);
      logger.info(chalk.green.bold("\n[✓] Done!"));
      logger.info(
        chalk.green(
          `[✓] Updated usage saved: ${result.usedAfter}/${result.plan.quota} (${formatPercent(result.plan.projectedPercent)})`,
        ),
      );
    }
  } finally {
    closeProgressBars();
  }
}

async function main(): Promise<void> {
  // -------------------------------------------------------------------------
  // CLI Setup
  // -------------------------------------------------------------------------
  program
    .name("dork-dispatch")
    .description("Run categorized search dorks against target domains via SerpApi")
    .version(VERSION)
    .option(
      "-d, --domain <domain>",
      "Target domain (repeatable, or comma-separated)",
      collect,
    )
    .option("--dorks <path>", "Dork file with [Category] sections")
    .option("-k, --apikey <key>", "SerpApi key (default: $SERPAPI_API_KEY)")
    .option("-p, --pages <number>", "Result pages per dork (1 credit each)")
    .option("-w, --workers <number>", "Parallel workers")
    .option("--delay <seconds>", "Pause after each page request")
    .option("--csv", "Also write results.csv per category", false)
    .option("--quota <number>", "Monthly credit quota")
    .option("--used <number>", "Credits already used this month (overrides the usage file)")
    .option("--hard-cap <number>", "Refuse to start if a run needs more credits than this")
    .option("--auto-quota", "Read quota and usage from the SerpApi account endpoint", false)
    .option("--live-poll", "Poll account usage while the run is in progress", false)
    .option("--poll-interval <seconds>", "Seconds between live usage polls")
    .option("-o, --output <dir>", "Output directory")
    .option("--usage-file <path>", "Where monthly usage is stored")
    .option("-y, --yes", "Skip the confirmation prompt", false)
    .option("-v, --verbose", "Show verbose debug output", false)
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Single domain: dork-dispatch -d example.org --dorks dorks.txt
    - Several domains: dork-dispatch -d a.example,b.example --dorks dorks.txt
    - Budgeted run: dork-dispatch -d example.org --dorks dorks.txt -p 1 --hard-cap 50
    - Account-backed quota: dork-dispatch -d example.org --dorks dorks.txt --auto-quota
    - Output: {output}/{category}/urls.txt, {output}/all_urls.txt
      `,
    )
    .parse();

  const options = program.opts<CliOptions>();

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  let isShuttingDown = false;

  process.on("SIGINT", () => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(chalk.yellow("\n\n⚠ Interrupted by user (Ctrl+C)"));
    logger.info(chalk.gray("- Closing progress bars"));
    closeProgressBars();
    logger.info(chalk.gray("Exiting..."));
    process.exit(130);
  });

  process.on("unhandledRejection", (reason) => {
    if (isExitPromptError(reason)) {
      cleanupAfterPromptExit();
      process.exit(130);
    }
    logger.error(reason);
    process.exit(1);
  });

  // -------------------------------------------------------------------------
  // Resolve Configuration
  // -------------------------------------------------------------------------
  showHeader(VERSION);

  const config = resolveConfig(await fillMissingOptions(options));
  setVerboseMode(config.verbose);

  await runDispatch(config);
}

// ============================================================================
// SECTION 5: ERROR HANDLING
// ============================================================================

if (process.env.NODE_ENV !== "production") {
  await import("dotenv/config");
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((err: unknown) => {
    closeProgressBars();
    const exitCode = err instanceof DispatchError ? err.exitCode : 1;
    logger.error(chalk.red(`\n[!] ${errorMessage(err)}`));
    process.exit(exitCode);
  });
