import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  QuotaStore,
  RemoteQuotaSource,
  currentPeriod,
} from "../src/quota/quota-store.js";
import type { AccountClient } from "../src/search/account-client.js";
import { QuotaCheckError } from "../src/types/errors.js";

// 18 October 2026, local time
const clock = () => new Date(2026, 9, 18, 12, 0, 0);

describe("currentPeriod", () => {
  it("formats the local calendar month as YYYY-MM", () => {
    expect(currentPeriod(new Date(2026, 0, 31))).toBe("2026-01");
    expect(currentPeriod(new Date(2026, 11, 1))).toBe("2026-12");
  });
});

describe("QuotaStore", () => {
  let tmpDir: string;
  let usageFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "quota-"));
    usageFile = path.join(tmpDir, "quota_usage.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("starts from zero when no usage file exists", () => {
    const store = new QuotaStore(usageFile, clock);

    expect(store.load()).toEqual({ period: "2026-10", used: 0 });
  });

  it("carries usage forward within the same month", () => {
    fs.writeFileSync(usageFile, JSON.stringify({ month: "2026-10", used: 37 }));
    const store = new QuotaStore(usageFile, clock);

    expect(store.load()).toEqual({ period: "2026-10", used: 37 });
  });

  it("resets usage when the stored month is not the current one", () => {
    fs.writeFileSync(usageFile, JSON.stringify({ month: "2026-09", used: 240 }));
    const store = new QuotaStore(usageFile, clock);

    expect(store.load()).toEqual({ period: "2026-10", used: 0 });
  });

  it.each([
    ["not JSON", "{month: oops"],
    ["wrong shape", JSON.stringify({ period: "2026-10", count: 5 })],
    ["negative usage", JSON.stringify({ month: "2026-10", used: -3 })],
    ["empty file", ""],
  ])("treats a damaged file (%s) as no usage", (_label, content) => {
    fs.writeFileSync(usageFile, content);
    const store = new QuotaStore(usageFile, clock);

    expect(store.load()).toEqual({ period: "2026-10", used: 0 });
  });

  it("saves the current month and leaves no temp file behind", () => {
    const store = new QuotaStore(usageFile, clock);

    const saved = store.save(20);

    expect(saved).toEqual({ period: "2026-10", used: 20 });
    expect(JSON.parse(fs.readFileSync(usageFile, "utf-8"))).toEqual({
      month: "2026-10",
      used: 20,
    });
    expect(fs.readdirSync(tmpDir)).toEqual(["quota_usage.json"]);
  });

  it("creates the parent directory when saving", () => {
    const nested = path.join(tmpDir, "state", "usage.json");
    const store = new QuotaStore(nested, clock);

    store.save(3);

    expect(new QuotaStore(nested, clock).load().used).toBe(3);
  });
});

describe("RemoteQuotaSource", () => {
  it("returns the account counters", async () => {
    const client: AccountClient = {
      getAccountStatus: vi.fn(async () => ({ quota: 5000, used: 120 })),
    };

    await expect(new RemoteQuotaSource(client).fetch()).resolves.toEqual({
      quota: 5000,
      used: 120,
    });
  });

  it("fails closed with a QuotaCheckError", async () => {
    const client: AccountClient = {
      getAccountStatus: vi.fn(async () => {
        throw new Error("connection refused");
      }),
    };

    const attempt = new RemoteQuotaSource(client).fetch();

    await expect(attempt).rejects.toBeInstanceOf(QuotaCheckError);
    await expect(attempt).rejects.toThrow(
      "Could not auto-detect quota from the account endpoint: connection refused",
    );
  });
});
