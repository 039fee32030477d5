import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { runClean, runValidate } from "./pipeline";
import { InputShapeError } from "./core/errors";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "scrape-quality-pipeline-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeJson(name: string, data: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(data), "utf-8");
  return filePath;
}

const raw = [
  {
    title: "  Great Deal!  ",
    description: "This is a fairly long product description text.",
    price: "$19.99",
    url: " http://example.com/x ",
  },
  { title: "", price: -5, url: "ftp://bad" },
];

describe("runClean", () => {
  it("writes one cleaned record per raw record", () => {
    const inputPath = writeJson("raw.json", raw);
    const outputPath = path.join(dir, "cleaned.json");

    const result = runClean({ inputPath, outputPath });

    expect(result.outputPath).toBe(outputPath);
    expect(JSON.parse(fs.readFileSync(outputPath, "utf-8"))).toEqual([
      {
        id: null,
        title: "Great Deal!",
        content: "This is a fairly long product description text.",
        price: 19.99,
        currency: "USD",
        url: "http://example.com/x",
        scraped_at: null,
      },
      {
        id: null,
        title: null,
        content: null,
        price: -5,
        currency: null,
        url: "ftp://bad",
        scraped_at: null,
      },
    ]);
  });

  it("fails on a top-level object and writes nothing", () => {
    const inputPath = writeJson("raw.json", { title: "not a list" });
    const outputPath = path.join(dir, "cleaned.json");

    expect(() => runClean({ inputPath, outputPath })).toThrow(InputShapeError);
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(fs.readdirSync(dir)).toEqual(["raw.json"]);
  });

  it("fails when an element is not a record", () => {
    const inputPath = writeJson("raw.json", [{ title: "ok" }, "bad"]);
    const outputPath = path.join(dir, "cleaned.json");

    expect(() => runClean({ inputPath, outputPath })).toThrow(
      "record at index 1 is not an object (got string)"
    );
    expect(fs.existsSync(outputPath)).toBe(false);
  });
});

describe("runValidate", () => {
  it("validates the cleaner output and writes the report and summary", () => {
    const cleanedPath = path.join(dir, "cleaned.json");
    runClean({ inputPath: writeJson("raw.json", raw), outputPath: cleanedPath });

    const reportPath = path.join(dir, "report.txt");
    const summaryPath = path.join(dir, "summary.json");
    const result = runValidate({ inputPath: cleanedPath, reportPath, summaryPath, details: true });

    expect(result.report.valid_records).toBe(1);
    expect(result.report.invalid_records).toBe(1);
    expect(result.report.issues).toEqual([
      { code: "MISSING_TITLE", count: 1 },
      { code: "MISSING_CONTENT", count: 1 },
      { code: "INVALID_URL", count: 1 },
      { code: "INVALID_PRICE", count: 1 },
    ]);

    const text = fs.readFileSync(reportPath, "utf-8").split("\n");
    expect(text).toContain("Total records: 2");
    expect(text).toContain("- price: 100.0%");
    expect(text).toContain("Record 1 (id=#1): OK");

    const summary = JSON.parse(fs.readFileSync(summaryPath, "utf-8"));
    expect(summary.total_violations).toBe(4);
  });

  it("reads cleaned records from CSV", () => {
    const cleanedPath = path.join(dir, "cleaned.csv");
    runClean({ inputPath: writeJson("raw.json", raw), outputPath: cleanedPath });

    const reportPath = path.join(dir, "report.txt");
    const { report } = runValidate({
      inputPath: cleanedPath,
      reportPath,
      summaryPath: null,
      details: false,
    });

    expect(report.total_records).toBe(2);
    expect(report.total_violations).toBe(4);
    expect(fs.readFileSync(reportPath, "utf-8")).not.toContain("DETAILS");
    expect(fs.existsSync(path.join(dir, "summary.json"))).toBe(false);
  });

  it("reports an empty dataset", () => {
    const reportPath = path.join(dir, "report.txt");
    const { report } = runValidate({
      inputPath: writeJson("cleaned.json", []),
      reportPath,
      summaryPath: null,
      details: true,
    });

    expect(report.total_records).toBe(0);
    expect(report.issues).toEqual([]);
    expect(fs.readFileSync(reportPath, "utf-8")).toContain("No issues found.");
  });

  it("fails on a top-level object and writes no report", () => {
    const reportPath = path.join(dir, "report.txt");
    expect(() =>
      runValidate({
        inputPath: writeJson("cleaned.json", { records: [] }),
        reportPath,
        summaryPath: null,
        details: true,
      })
    ).toThrow(InputShapeError);
    expect(fs.existsSync(reportPath)).toBe(false);
  });
});
