import { CLEANED_FIELDS, type QualityReport } from "../types";
import { VIOLATION_MESSAGES } from "./rules";

export interface RenderOptions {
  /** Append the per-record DETAILS section */
  details: boolean;
}

function heading(title: string): string[] {
  return [title, "-".repeat(title.length)];
}

/**
 * Generate the human-readable quality report.
 * The layout is fixed so the same report always renders to the same text.
 */
export function renderReport(
  report: QualityReport,
  options: RenderOptions = { details: true }
): string {
  const lines: string[] = ["DATA QUALITY REPORT", "===================", ""];

  lines.push(...heading("SUMMARY"));
  lines.push(`Total records: ${report.total_records}`);
  lines.push(`Valid records: ${report.valid_records}`);
  lines.push(`Invalid records: ${report.invalid_records}`);
  lines.push(`Total violations: ${report.total_violations}`);
  lines.push("");

  lines.push(...heading("COMPLETENESS (% non-empty per field)"));
  for (const field of CLEANED_FIELDS) {
    lines.push(`- ${field}: ${report.completeness[field].toFixed(1)}%`);
  }
  lines.push("");

  lines.push(...heading("MOST COMMON ISSUES"));
  if (report.issues.length === 0) {
    lines.push("No issues found.");
  } else {
    for (const { code, count } of report.issues) {
      lines.push(`- ${code}: ${count}`);
    }
  }

  if (options.details) {
    lines.push("");
    lines.push(...heading("DETAILS"));
    for (const outcome of report.records) {
      const label = outcome.id ?? `#${outcome.index}`;
      if (outcome.violations.length === 0) {
        lines.push(`Record ${outcome.index} (id=${label}): OK`);
        continue;
      }
      lines.push(`Record ${outcome.index} (id=${label}):`);
      for (const code of outcome.violations) {
        lines.push(`  - ${code}: ${VIOLATION_MESSAGES[code]}`);
      }
    }
  }

  return lines.join("\n") + "\n";
}
