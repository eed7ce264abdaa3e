import chalk from "chalk";
import type { AccountClient, AccountStatus } from "../search/account-client.js";
import { MIN_POLL_INTERVAL_SECONDS } from "../types/constants.js";
import { errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";

export interface LiveUsagePollerOptions {
  intervalMs: number;
  minIntervalMs?: number;
  onSample?: (status: AccountStatus) => void;
}

/**
 * Samples the account endpoint on a timer while a run is dispatching.
 *
 * Failures are logged and the next tick tries again. Samples are reported
 * only; they never feed back into local quota accounting.
 */
export class LiveUsagePoller {
  private client: AccountClient;
  private intervalMs: number;
  private onSample?: (status: AccountStatus) => void;
  private timer: ReturnType<typeof setInterval> | null;
  private inFlight: Promise<void> | null;
  private lastStatus: AccountStatus | null;
  private failures: number;

  constructor(client: AccountClient, options: LiveUsagePollerOptions) {
    this.client = client;
    const minIntervalMs =
      options.minIntervalMs ?? MIN_POLL_INTERVAL_SECONDS * 1000;
    this.intervalMs = Math.max(minIntervalMs, options.intervalMs);
    this.onSample = options.onSample;
    this.timer = null;
    this.inFlight = null;
    this.lastStatus = null;
    this.failures = 0;
  }

  get interval(): number {
    return this.intervalMs;
  }

  get latest(): AccountStatus | null {
    return this.lastStatus;
  }

  get failureCount(): number {
    return this.failures;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  /**
   * Stops the timer and waits for a poll that is already running.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private tick(): void {
    // Skip this tick if the previous poll hasn't answered yet.
    if (this.inFlight) {
      return;
    }
    this.inFlight = this.poll().finally(() => {
      this.inFlight = null;
    });
  }

  private async poll(): Promise<void> {
    try {
      const status = await this.client.getAccountStatus();
      this.lastStatus = status;
      logger.debug(
        chalk.gray(`Live usage: ${status.used}/${status.quota} credits`),
      );
      this.onSample?.(status);
    } catch (error) {
      this.failures++;
      logger.warn(
        chalk.yellow(`Live usage poll failed: ${errorMessage(error)}`),
      );
    }
  }
}
