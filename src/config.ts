import { z } from "zod";
import {
  DEFAULT_DELAY_SECONDS,
  DEFAULT_MONTHLY_QUOTA,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PAGES,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_USAGE_FILE,
  DEFAULT_WORKERS,
  MIN_POLL_INTERVAL_SECONDS,
} from "./types/constants.js";
import { ConfigurationError } from "./types/errors.js";

/**
 * Raw option values as commander hands them over. Numbers arrive as strings.
 */
export type CliOptions = {
  domain?: string[];
  dorks?: string;
  apikey?: string;
  pages?: string;
  workers?: string;
  delay?: string;
  csv?: boolean;
  quota?: string;
  used?: string;
  hardCap?: string;
  autoQuota?: boolean;
  livePoll?: boolean;
  pollInterval?: string;
  output?: string;
  usageFile?: string;
  yes?: boolean;
  verbose?: boolean;
};

const configSchema = z.object({
  domains: z.array(z.string().min(1)).min(1, "At least one --domain is required"),
  dorksPath: z.string().min(1, "--dorks is required"),
  apiKey: z.string().min(1, "An API key is required (--apikey or SERPAPI_API_KEY)"),
  pages: z.coerce.number().int().positive(),
  workers: z.coerce.number().int().positive(),
  delaySeconds: z.coerce.number().nonnegative(),
  csv: z.boolean(),
  quota: z.coerce.number().int().nonnegative(),
  usedOverride: z.coerce.number().int().nonnegative().optional(),
  hardCap: z.coerce.number().int().nonnegative().optional(),
  autoQuota: z.boolean(),
  livePoll: z.boolean(),
  pollIntervalSeconds: z.coerce
    .number()
    .positive()
    .transform((value) => Math.max(MIN_POLL_INTERVAL_SECONDS, value)),
  outputDir: z.string().min(1),
  usageFile: z.string().min(1),
  assumeYes: z.boolean(),
  verbose: z.boolean(),
});

export type DispatchConfig = z.infer<typeof configSchema>;

/**
 * `-d a.com -d b.com,c.com` → `["a.com", "b.com", "c.com"]`, trimmed and
 * without duplicates.
 */
export function splitDomains(values: string[] = []): string[] {
  const domains = values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  return [...new Set(domains)];
}

/**
 * Merge CLI options, environment and defaults into a validated config.
 * CLI flags win over the environment.
 */
export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): DispatchConfig {
  const parsed = configSchema.safeParse({
    domains: splitDomains(options.domain),
    dorksPath: options.dorks ?? "",
    apiKey: options.apikey ?? env.SERPAPI_API_KEY ?? "",
    pages: options.pages ?? DEFAULT_PAGES,
    workers: options.workers ?? DEFAULT_WORKERS,
    delaySeconds: options.delay ?? DEFAULT_DELAY_SECONDS,
    csv: options.csv ?? false,
    quota: options.quota ?? DEFAULT_MONTHLY_QUOTA,
    usedOverride: options.used,
    hardCap: options.hardCap,
    autoQuota: options.autoQuota ?? false,
    livePoll: options.livePoll ?? false,
    pollIntervalSeconds: options.pollInterval ?? DEFAULT_POLL_INTERVAL_SECONDS,
    outputDir:
      options.output ?? env.DORK_DISPATCH_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    usageFile:
      options.usageFile ?? env.DORK_DISPATCH_USAGE_FILE ?? DEFAULT_USAGE_FILE,
    assumeYes: options.yes ?? false,
    verbose: options.verbose ?? false,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
