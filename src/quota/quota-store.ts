import fs from "fs";
import path from "path";
import { z } from "zod";
import type { AccountClient, AccountStatus } from "../search/account-client.js";
import { QuotaCheckError, errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";

export interface QuotaState {
  /** Calendar month, `YYYY-MM`. */
  period: string;
  used: number;
}

const usageFileSchema = z.object({
  month: z.string(),
  used: z.number().int().nonnegative(),
});

export type Clock = () => Date;

export function currentPeriod(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, "0");
  return `${now.getFullYear()}-${month}`;
}

/**
 * Monthly credit usage persisted in a small JSON file:
 * `{"month": "2026-10", "used": 42}`.
 *
 * Usage rolls back to zero on the first load in a new month. A missing or
 * damaged file counts as "nothing used yet".
 */
export class QuotaStore {
  private filePath: string;
  private clock: Clock;

  constructor(filePath: string, clock: Clock = () => new Date()) {
    this.filePath = filePath;
    this.clock = clock;
  }

  get path(): string {
    return this.filePath;
  }

  period(): string {
    return currentPeriod(this.clock());
  }

  load(): QuotaState {
    const period = this.period();
    const fresh: QuotaState = { period, used: 0 };

    if (!fs.existsSync(this.filePath)) {
      return fresh;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      logger.debug(
        `Usage file ${this.filePath} unreadable (${errorMessage(error)}), starting from 0`,
      );
      return fresh;
    }

    const parsed = usageFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug(`Usage file ${this.filePath} malformed, starting from 0`);
      return fresh;
    }

    if (parsed.data.month !== period) {
      logger.debug(
        `Usage file is for ${parsed.data.month}, resetting for ${period}`,
      );
      return fresh;
    }

    return { period, used: parsed.data.used };
  }

  /**
   * Writes to a sibling temp file, then renames it into place so a reader
   * never sees half a file.
   */
  save(used: number): QuotaState {
    const state: QuotaState = { period: this.period(), used };
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(
      tmpPath,
      JSON.stringify({ month: state.period, used: state.used }),
    );
    fs.renameSync(tmpPath, this.filePath);
    return state;
  }
}

/**
 * Authoritative quota/usage from the provider's account endpoint. There is no
 * fallback to local numbers: if the lookup fails, the run must not start.
 */
export class RemoteQuotaSource {
  private client: AccountClient;

  constructor(client: AccountClient) {
    this.client = client;
  }

  async fetch(): Promise<AccountStatus> {
    try {
      return await this.client.getAccountStatus();
    } catch (error) {
      throw new QuotaCheckError(
        `Could not auto-detect quota from the account endpoint: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
