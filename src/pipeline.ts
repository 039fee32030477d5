import type { CleanConfig, CleanedRecord, QualityReport, ValidateConfig } from "./types";
import { readDataset } from "./core/file-reader";
import { toCleanedRecord } from "./core/dataset";
import { cleanDataset } from "./cleaner/record";
import { buildReport } from "./validator/report";
import { renderReport } from "./validator/render";
import { exportCleaned, exportReport, exportSummary } from "./exporter";

export interface CleanRunResult {
  records: CleanedRecord[];
  outputPath: string;
}

export interface ValidateRunResult {
  report: QualityReport;
  reportPath: string;
  summaryPath: string | null;
}

/**
 * Read raw records, clean them and write the cleaned dataset.
 * Shape errors are thrown before anything is written.
 */
export function runClean(config: CleanConfig): CleanRunResult {
  const raw = readDataset(config.inputPath, "cleaner");
  const records = cleanDataset(raw);
  const outputPath = exportCleaned(records, config.outputPath);
  return { records, outputPath };
}

/**
 * Read cleaned records, validate them and write the quality report
 * (plus the JSON summary when a path is configured).
 */
export function runValidate(config: ValidateConfig): ValidateRunResult {
  const records = readDataset(config.inputPath, "validator").map(toCleanedRecord);
  const report = buildReport(records);
  const text = renderReport(report, { details: config.details });

  const reportPath = exportReport(text, config.reportPath);
  const summaryPath = config.summaryPath
    ? exportSummary(report, config.summaryPath)
    : null;
  return { report, reportPath, summaryPath };
}
