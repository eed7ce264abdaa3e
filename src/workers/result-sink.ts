import fs from "fs";
import path from "path";
import pLimit from "p-limit";
import {
  CATEGORY_CSV_FILE,
  CATEGORY_URLS_FILE,
  COMBINED_FILE,
} from "../types/constants.js";
import type { QueryResult, RecordOutcome, SinkSnapshot } from "./types.js";

type Limit = ReturnType<typeof pLimit>;

interface CategoryDestination {
  /** First category name seen for this directory. */
  category: string;
  dir: string;
  urlsPath: string;
  csvPath: string;
  known: Set<string> | null;
  lock: Limit;
}

export interface ResultSinkOptions {
  csv?: boolean;
}

const UNSAFE_PATH_CHARS = /[\\/:*?"<>|]/g;

export function categoryDirName(category: string): string {
  return category.replace(UNSAFE_PATH_CHARS, "_");
}

/** Double quotes inside a field become single quotes so rows stay well-formed. */
export function csvRow(fields: string[]): string {
  return fields.map((field) => `"${field.replace(/"/g, "'")}"`).join(",");
}

function readLines(filePath: string): Set<string> {
  if (!fs.existsSync(filePath)) {
    return new Set();
  }
  const lines = fs
    .readFileSync(filePath, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return new Set(lines);
}

/**
 * Result Sink
 *
 * Layout under the output directory:
 *
 *   <category>/urls.txt     append-only, one URL per line, never repeated
 *   <category>/results.csv  optional, one row per newly written URL
 *   all_urls.txt            sorted union of every URL seen this run
 *
 * Each category has its own lock around read-diff-append. The combined file
 * is rewritten wholesale under a single lock shared by every caller.
 */
export class ResultSink {
  private outputDir: string;
  private csv: boolean;
  private categories: Map<string, CategoryDestination>;
  private combined: Set<string>;
  private combinedLock: Limit;

  constructor(outputDir: string, options: ResultSinkOptions = {}) {
    this.outputDir = outputDir;
    this.csv = options.csv ?? false;
    this.categories = new Map();
    this.combined = new Set();
    this.combinedLock = pLimit(1);
  }

  get combinedPath(): string {
    return path.join(this.outputDir, COMBINED_FILE);
  }

  categoryPath(category: string): string {
    return path.join(
      this.outputDir,
      categoryDirName(category),
      CATEGORY_URLS_FILE,
    );
  }

  csvPath(category: string): string {
    return path.join(
      this.outputDir,
      categoryDirName(category),
      CATEGORY_CSV_FILE,
    );
  }

  async record(result: QueryResult): Promise<RecordOutcome> {
    const destination = this.destinationFor(result.category);

    const newUrls = await destination.lock(() =>
      this.appendNew(destination, result),
    );
    await this.combinedLock(() => this.rewriteCombined(result.urls));

    return { newUrls, totalUrls: result.urls.size };
  }

  snapshot(): SinkSnapshot {
    const perCategory: Record<string, number> = {};
    for (const destination of this.categories.values()) {
      perCategory[destination.category] = destination.known?.size ?? 0;
    }
    return { combined: this.combined.size, perCategory };
  }

  // Keyed by directory so names that map to the same files share one lock.
  private destinationFor(category: string): CategoryDestination {
    const dirName = categoryDirName(category);
    let destination = this.categories.get(dirName);
    if (!destination) {
      const dir = path.join(this.outputDir, dirName);
      destination = {
        category,
        dir,
        urlsPath: path.join(dir, CATEGORY_URLS_FILE),
        csvPath: path.join(dir, CATEGORY_CSV_FILE),
        known: null,
        lock: pLimit(1),
      };
      this.categories.set(dirName, destination);
    }
    return destination;
  }

  private async appendNew(
    destination: CategoryDestination,
    result: QueryResult,
  ): Promise<number> {
    await fs.promises.mkdir(destination.dir, { recursive: true });

    // Seed from disk once so URLs from earlier runs are not written again.
    if (!destination.known) {
      destination.known = readLines(destination.urlsPath);
    }
    const known = destination.known;

    const fresh = [...result.urls].filter((url) => !known.has(url)).sort();
    if (fresh.length === 0) {
      return 0;
    }

    await fs.promises.appendFile(
      destination.urlsPath,
      fresh.map((url) => `${url}\n`).join(""),
    );
    for (const url of fresh) {
      known.add(url);
    }

    if (this.csv) {
      const rows = fresh.map(
        (url) => `${csvRow([result.category, result.queryTemplate, url])}\n`,
      );
      await fs.promises.appendFile(destination.csvPath, rows.join(""));
    }

    return fresh.length;
  }

  private async rewriteCombined(urls: Set<string>): Promise<void> {
    for (const url of urls) {
      this.combined.add(url);
    }
    await fs.promises.mkdir(this.outputDir, { recursive: true });

    const body = [...this.combined]
      .sort()
      .map((url) => `${url}\n`)
      .join("");
    const tmpPath = `${this.combinedPath}.tmp`;
    await fs.promises.writeFile(tmpPath, body);
    await fs.promises.rename(tmpPath, this.combinedPath);
  }
}
