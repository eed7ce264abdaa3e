import { describe, expect, it } from "vitest";
import { resolveConfig, splitDomains } from "../src/config.js";
import { ConfigurationError } from "../src/types/errors.js";

const baseOptions = {
  domain: ["example.org"],
  dorks: "dorks.txt",
  apikey: "test-key",
};

describe("splitDomains", () => {
  it("flattens repeated and comma-separated values", () => {
    expect(splitDomains(["a.test", " b.test , c.test", "a.test", ","])).toEqual([
      "a.test",
      "b.test",
      "c.test",
    ]);
  });

  it("returns nothing for no input", () => {
    expect(splitDomains()).toEqual([]);
  });
});

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const config = resolveConfig(baseOptions, {});

    expect(config).toEqual({
      domains: ["example.org"],
      dorksPath: "dorks.txt",
      apiKey: "test-key",
      pages: 2,
      workers: 8,
      delaySeconds: 0.8,
      csv: false,
      quota: 250,
      usedOverride: undefined,
      hardCap: undefined,
      autoQuota: false,
      livePoll: false,
      pollIntervalSeconds: 30,
      outputDir: "output",
      usageFile: "quota_usage.json",
      assumeYes: false,
      verbose: false,
    });
  });

  it("coerces numeric option strings", () => {
    const config = resolveConfig(
      {
        ...baseOptions,
        pages: "3",
        workers: "4",
        delay: "0",
        quota: "1000",
        used: "12",
        hardCap: "50",
      },
      {},
    );

    expect(config.pages).toBe(3);
    expect(config.workers).toBe(4);
    expect(config.delaySeconds).toBe(0);
    expect(config.quota).toBe(1000);
    expect(config.usedOverride).toBe(12);
    expect(config.hardCap).toBe(50);
  });

  it("raises the poll interval to the floor", () => {
    const config = resolveConfig({ ...baseOptions, pollInterval: "2" }, {});

    expect(config.pollIntervalSeconds).toBe(5);
  });

  it("reads the API key and paths from the environment", () => {
    const config = resolveConfig(
      { domain: ["example.org"], dorks: "dorks.txt" },
      {
        SERPAPI_API_KEY: "env-key",
        DORK_DISPATCH_OUTPUT_DIR: "/tmp/out",
        DORK_DISPATCH_USAGE_FILE: "/tmp/usage.json",
      },
    );

    expect(config.apiKey).toBe("env-key");
    expect(config.outputDir).toBe("/tmp/out");
    expect(config.usageFile).toBe("/tmp/usage.json");
  });

  it("lets flags win over the environment", () => {
    const config = resolveConfig(
      { ...baseOptions, output: "flag-out" },
      { SERPAPI_API_KEY: "env-key", DORK_DISPATCH_OUTPUT_DIR: "env-out" },
    );

    expect(config.apiKey).toBe("test-key");
    expect(config.outputDir).toBe("flag-out");
  });

  it("rejects a missing API key", () => {
    expect(() =>
      resolveConfig({ domain: ["example.org"], dorks: "dorks.txt" }, {}),
    ).toThrow(
      "Invalid configuration: apiKey: An API key is required (--apikey or SERPAPI_API_KEY)",
    );
  });

  it("rejects invalid numbers as a configuration error", () => {
    const resolve = () =>
      resolveConfig({ ...baseOptions, workers: "0", pages: "many" }, {});

    expect(resolve).toThrow(ConfigurationError);
    expect(resolve).toThrow(/pages: /);
    expect(resolve).toThrow(/workers: /);
  });

  it("rejects an empty domain list", () => {
    expect(() =>
      resolveConfig({ ...baseOptions, domain: [" , "] }, {}),
    ).toThrow("domains: At least one --domain is required");
  });
});
