import fs from "fs";
import { DOMAIN_PLACEHOLDERS, UNCATEGORIZED } from "../types/constants.js";
import { ConfigurationError, errorMessage } from "../types/errors.js";

/** Category name mapped to its query templates, in file order. */
export type DorkCategories = Map<string, string[]>;

const HEADER_PATTERN = /^\[(.+?)\]$/;

/**
 * Parses the sectioned dork format:
 *
 * ```
 * # comment
 * [Login Pages]
 * site:example.com inurl:login
 * ```
 *
 * Templates that appear before the first header land in "Uncategorized".
 * A header that repeats keeps appending to the same category.
 */
export function parseDorkSource(text: string): DorkCategories {
  const categories: DorkCategories = new Map();
  let current: string | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    const header = HEADER_PATTERN.exec(line);
    if (header?.[1]) {
      current = header[1];
      if (!categories.has(current)) {
        categories.set(current, []);
      }
      continue;
    }

    if (current === null) {
      current = UNCATEGORIZED;
      if (!categories.has(current)) {
        categories.set(current, []);
      }
    }

    categories.get(current)?.push(line);
  }

  return categories;
}

export function loadDorkFile(filePath: string): DorkCategories {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read dork file ${filePath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  return parseDorkSource(text);
}

export function countTemplates(categories: DorkCategories): number {
  let total = 0;
  for (const templates of categories.values()) {
    total += templates.length;
  }
  return total;
}

export function substituteDomain(template: string, domain: string): string {
  let query = template;
  for (const placeholder of DOMAIN_PLACEHOLDERS) {
    query = query.replaceAll(placeholder, domain);
  }
  return query;
}
