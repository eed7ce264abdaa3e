import { confirm, input, select } from "@inquirer/prompts";
import chalk from "chalk";
import { logger } from "./logger.js";

type CleanupFn = () => Promise<void> | void;

type PromptChoice<T> = {
  name: string;
  value: T;
  description?: string;
  disabled?: boolean | string;
};

type BasePromptOptions = {
  message: string;
  cleanup?: CleanupFn;
};

type InputPromptOptions = BasePromptOptions & {
  default?: string;
  validate?: (value: string) => boolean | string;
};

type ConfirmPromptOptions = BasePromptOptions & {
  default?: boolean;
};

type SelectPromptOptions<T> = BasePromptOptions & {
  choices: PromptChoice<T>[];
  default?: T;
  pageSize?: number;
};

export function isExitPromptError(error: unknown): boolean {
  return error instanceof Error && error.name === "ExitPromptError";
}

async function handlePromptExit(cleanup?: CleanupFn): Promise<never> {
  logger.info(chalk.yellow("\n\n⚠ Prompt cancelled by user (Ctrl+C)"));
  logger.info(chalk.gray("Cleaning up resources..."));
  if (cleanup) {
    await cleanup();
  }
  logger.info(chalk.gray("Exiting..."));
  process.exit(130);
}

async function withPromptExit<R>(
  cleanup: CleanupFn | undefined,
  ask: () => Promise<R>,
): Promise<R> {
  try {
    return await ask();
  } catch (error) {
    if (isExitPromptError(error)) {
      return handlePromptExit(cleanup);
    }
    throw error;
  }
}

export function promptInput(options: InputPromptOptions): Promise<string> {
  return withPromptExit(options.cleanup, () =>
    input({
      message: options.message,
      default: options.default,
      validate: options.validate,
    }),
  );
}

export function promptConfirm(
  options: ConfirmPromptOptions,
): Promise<boolean> {
  return withPromptExit(options.cleanup, () =>
    confirm({
      message: options.message,
      default: options.default,
    }),
  );
}

export function promptSelect<T>(
  options: SelectPromptOptions<T>,
): Promise<T> {
  return withPromptExit(options.cleanup, () =>
    select<T>({
      message: options.message,
      choices: options.choices,
      default: options.default,
      pageSize: options.pageSize,
    }),
  );
}
