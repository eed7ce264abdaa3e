export const SERPAPI_SEARCH_URL = "https://serpapi.com/search";
export const SERPAPI_ACCOUNT_URL = "https://serpapi.com/account";

/** Results requested per page; also the offset stride between pages. */
export const RESULTS_PER_PAGE = 100;
export const REQUEST_TIMEOUT_MS = 20_000;

export const MAX_RETRIES = 3;
export const BACKOFF_BASE = 2.0;

export const DEFAULT_PAGES = 2;
export const DEFAULT_WORKERS = 8;
export const DEFAULT_DELAY_SECONDS = 0.8;
export const DEFAULT_MONTHLY_QUOTA = 250;
export const DEFAULT_USAGE_FILE = "quota_usage.json";
export const DEFAULT_OUTPUT_DIR = "output";
export const DEFAULT_POLL_INTERVAL_SECONDS = 30;
export const MIN_POLL_INTERVAL_SECONDS = 5;

export const UNCATEGORIZED = "Uncategorized";

/** Placeholders in a dork template that are replaced by the target domain. */
export const DOMAIN_PLACEHOLDERS = ["example[.]com", "example.com", "{domain}"];

export const COMBINED_FILE = "all_urls.txt";
export const CATEGORY_URLS_FILE = "urls.txt";
export const CATEGORY_CSV_FILE = "results.csv";
