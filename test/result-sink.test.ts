import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ResultSink,
  categoryDirName,
  csvRow,
} from "../src/workers/result-sink.js";
import type { QueryResult } from "../src/workers/types.js";

function result(
  category: string,
  urls: string[],
  queryTemplate = "site:example.com inurl:admin",
): QueryResult {
  return {
    domain: "target.test",
    category,
    queryTemplate,
    query: queryTemplate.replace("example.com", "target.test"),
    urls: new Set(urls),
    pagesSucceeded: 1,
    pagesFailed: 0,
  };
}

function lines(filePath: string): string[] {
  return fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
}

describe("ResultSink", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "sink-")), "out");
  });

  afterEach(() => {
    fs.rmSync(path.dirname(outputDir), { recursive: true, force: true });
  });

  it("creates nothing on disk until the first record", () => {
    new ResultSink(outputDir);

    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it("appends new URLs sorted within the batch", async () => {
    const sink = new ResultSink(outputDir);

    const outcome = await sink.record(
      result("Admin", ["https://target.test/z", "https://target.test/a"]),
    );

    expect(outcome).toEqual({ newUrls: 2, totalUrls: 2 });
    expect(lines(sink.categoryPath("Admin"))).toEqual([
      "https://target.test/a",
      "https://target.test/z",
    ]);
  });

  it("never writes the same URL twice to a category", async () => {
    const sink = new ResultSink(outputDir);
    const urls = ["https://target.test/a", "https://target.test/b"];

    await sink.record(result("Admin", urls));
    const second = await sink.record(result("Admin", urls));
    await sink.record(result("Admin", ["https://target.test/b", "https://target.test/c"]));

    expect(second.newUrls).toBe(0);
    expect(lines(sink.categoryPath("Admin"))).toEqual([
      "https://target.test/a",
      "https://target.test/b",
      "https://target.test/c",
    ]);
    expect(sink.snapshot().perCategory).toEqual({ Admin: 3 });
  });

  it("dedupes against a category file left by an earlier run", async () => {
    const sink = new ResultSink(outputDir);
    fs.mkdirSync(path.dirname(sink.categoryPath("Admin")), { recursive: true });
    fs.writeFileSync(sink.categoryPath("Admin"), "https://target.test/old\n");

    const outcome = await sink.record(
      result("Admin", ["https://target.test/old", "https://target.test/new"]),
    );

    expect(outcome.newUrls).toBe(1);
    expect(lines(sink.categoryPath("Admin"))).toEqual([
      "https://target.test/old",
      "https://target.test/new",
    ]);
  });

  it("keeps the combined file equal to the sorted union under concurrent records", async () => {
    const sink = new ResultSink(outputDir);
    const batches = [
      result("Admin", ["https://target.test/c", "https://target.test/a"]),
      result("Files", ["https://target.test/b", "https://target.test/a"]),
      result("Admin", ["https://target.test/d"]),
      result("Login", []),
      result("Files", ["https://target.test/e", "https://target.test/c"]),
    ];

    await Promise.all(batches.map((batch) => sink.record(batch)));

    expect(lines(sink.combinedPath)).toEqual([
      "https://target.test/a",
      "https://target.test/b",
      "https://target.test/c",
      "https://target.test/d",
      "https://target.test/e",
    ]);
    expect(sink.snapshot()).toEqual({
      combined: 5,
      perCategory: { Admin: 3, Files: 4, Login: 0 },
    });
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      "Admin",
      "Files",
      "Login",
      "all_urls.txt",
    ]);
  });

  it("writes CSV rows only for new URLs, replacing double quotes", async () => {
    const sink = new ResultSink(outputDir, { csv: true });
    const template = 'site:example.com intitle:"index of"';

    await sink.record(result("Listings", ["https://target.test/files/"], template));
    await sink.record(result("Listings", ["https://target.test/files/"], template));

    expect(lines(sink.csvPath("Listings"))).toEqual([
      `"Listings","site:example.com intitle:'index of'","https://target.test/files/"`,
    ]);
  });

  it("does not create a CSV file when CSV output is off", async () => {
    const sink = new ResultSink(outputDir);

    await sink.record(result("Admin", ["https://target.test/a"]));

    expect(fs.existsSync(sink.csvPath("Admin"))).toBe(false);
  });

  it("maps path-unsafe category names to safe directories", async () => {
    const sink = new ResultSink(outputDir);

    await sink.record(result("Admin/Panels", ["https://target.test/a"]));

    expect(sink.categoryPath("Admin/Panels")).toBe(
      path.join(outputDir, "Admin_Panels", "urls.txt"),
    );
    expect(lines(sink.categoryPath("Admin/Panels"))).toEqual([
      "https://target.test/a",
    ]);
  });

  it("shares one file state between names that map to the same directory", async () => {
    const sink = new ResultSink(outputDir);

    const outcomes = await Promise.all([
      sink.record(
        result("Admin/Panels", ["https://target.test/a", "https://target.test/b"]),
      ),
      sink.record(
        result("Admin_Panels", ["https://target.test/b", "https://target.test/c"]),
      ),
    ]);

    expect(outcomes.map((outcome) => outcome.newUrls)).toEqual([2, 1]);
    expect(lines(sink.categoryPath("Admin_Panels"))).toEqual([
      "https://target.test/a",
      "https://target.test/b",
      "https://target.test/c",
    ]);
    expect(sink.snapshot().perCategory).toEqual({ "Admin/Panels": 3 });
  });
});

describe("csvRow", () => {
  it("quotes every field and swaps embedded double quotes", () => {
    expect(csvRow(['a"b', "c", ""])).toBe(`"a'b","c",""`);
  });
});

describe("categoryDirName", () => {
  it("replaces each unsafe character with an underscore", () => {
    expect(categoryDirName('a\\b:c*d?e"f<g>h|i')).toBe("a_b_c_d_e_f_g_h_i");
  });
});
