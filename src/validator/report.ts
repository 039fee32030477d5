import {
  CLEANED_FIELDS,
  type CleanedField,
  type CleanedRecord,
  type IssueCount,
  type QualityReport,
  type RecordOutcome,
  VIOLATION_CODES,
  type ViolationCode,
} from "../types";
import { nonBlank, roundPercent } from "../core/utils";
import { validateRecord } from "./rules";

/** Non-null, and for strings non-blank */
function isFilled(record: CleanedRecord, field: CleanedField): boolean {
  const value = record[field];
  if (typeof value === "string") return nonBlank(value) !== null;
  return value !== null;
}

function perField(value: (field: CleanedField) => number): Record<CleanedField, number> {
  return {
    id: value("id"),
    title: value("title"),
    content: value("content"),
    price: value("price"),
    currency: value("currency"),
    url: value("url"),
    scraped_at: value("scraped_at"),
  };
}

/**
 * Validate every record and aggregate the results in a single pass.
 * @param records - Cleaned records, in input order
 */
export function buildReport(records: CleanedRecord[]): QualityReport {
  const filled = perField(() => 0);
  const counts = new Map<ViolationCode, number>();
  const outcomes: RecordOutcome[] = [];
  let totalViolations = 0;

  records.forEach((record, i) => {
    for (const field of CLEANED_FIELDS) {
      if (isFilled(record, field)) filled[field]++;
    }

    const violations = validateRecord(record);
    for (const code of violations) {
      counts.set(code, (counts.get(code) ?? 0) + 1);
    }
    totalViolations += violations.length;
    outcomes.push({ index: i + 1, id: nonBlank(record.id), violations });
  });

  const completeness = perField((field) =>
    roundPercent(filled[field], records.length)
  );

  // Stable sort keeps taxonomy order among equal counts
  const issues: IssueCount[] = VIOLATION_CODES.map((code) => ({
    code,
    count: counts.get(code) ?? 0,
  }))
    .filter((issue) => issue.count > 0)
    .sort((a, b) => b.count - a.count);

  const invalid = outcomes.filter((o) => o.violations.length > 0).length;

  return {
    total_records: records.length,
    valid_records: records.length - invalid,
    invalid_records: invalid,
    total_violations: totalViolations,
    completeness,
    issues,
    records: outcomes,
  };
}
