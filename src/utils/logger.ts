const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

let isVerbose = false;
let isQuiet = false;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

/**
 * Silences everything except errors. Used when another component owns the
 * terminal, or by tests.
 */
export function setQuietMode(quiet: boolean): void {
  isQuiet = quiet;
}

function logWith(method: "log" | "warn" | "error", args: unknown[]): void {
  originalConsole[method](...args);
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const logger: Logger = {
  debug(...args: unknown[]): void {
    if (!isVerbose || isQuiet) {
      return;
    }
    logWith("log", args);
  },
  info(...args: unknown[]): void {
    if (isQuiet) {
      return;
    }
    logWith("log", args);
  },
  warn(...args: unknown[]): void {
    if (isQuiet) {
      return;
    }
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};

/**
 * Logger that tags every line, e.g. `[worker-2] ...`.
 */
export function scopedLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => logger.debug(tag, ...args),
    info: (...args) => logger.info(tag, ...args),
    warn: (...args) => logger.warn(tag, ...args),
    error: (...args) => logger.error(tag, ...args),
  };
}

export function installConsoleBridge(): void {
  console.log = (...args: unknown[]) => logger.info(...args);
  console.warn = (...args: unknown[]) => logger.warn(...args);
  console.error = (...args: unknown[]) => logger.error(...args);
}
