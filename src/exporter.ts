import * as fs from "fs";
import * as path from "path";
import { CLEANED_FIELDS, type CleanedRecord, type QualityReport } from "./types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

/** Write via a sibling temp file renamed into place; the target never holds partial content. */
function writeFileAtomic(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmpPath, content, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
  return filePath;
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 * @param value - The raw cell value
 */
export function escapeCsv(value: string | number | null): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Convert cleaned records to CSV, one column per cleaned field.
 * Null values become empty cells.
 */
export function toCsv(records: CleanedRecord[]): string {
  const header = CLEANED_FIELDS.map(escapeCsv).join(",");
  const lines = records.map((record) =>
    CLEANED_FIELDS.map((field) => escapeCsv(record[field])).join(",")
  );
  return BOM + [header, ...lines].join("\n") + "\n";
}

/**
 * Export cleaned records: CSV when the path ends in .csv, JSON otherwise.
 * @param records - Cleaned records
 * @param filePath - Target file (parent directory created if needed)
 * @returns Path of the written file
 */
export function exportCleaned(records: CleanedRecord[], filePath: string): string {
  if (path.extname(filePath).toLowerCase() === ".csv") {
    return writeFileAtomic(filePath, toCsv(records));
  }
  return writeFileAtomic(filePath, JSON.stringify(records, null, 2) + "\n");
}

/**
 * Save the rendered quality report text.
 */
export function exportReport(text: string, filePath: string): string {
  return writeFileAtomic(filePath, text);
}

/**
 * Write report statistics as JSON, for machines rather than people.
 */
export function exportSummary(report: QualityReport, filePath: string): string {
  return writeFileAtomic(filePath, JSON.stringify(report, null, 2) + "\n");
}
