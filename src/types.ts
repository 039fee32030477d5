/** Any value a decoded scrape can carry under a record key */
export type RawValue =
  | string
  | number
  | boolean
  | null
  | RawValue[]
  | { [key: string]: RawValue };

/** One scraped record as it arrives: no key is guaranteed */
export type RawRecord = { [key: string]: RawValue };

/** Fixed-shape record emitted by the cleaner; absent values are null, never missing */
export interface CleanedRecord {
  id: string | null;
  title: string | null;
  content: string | null;
  price: number | null;
  currency: string | null;
  url: string | null;
  scraped_at: string | null;
}

/** Cleaned field names in output order */
export const CLEANED_FIELDS = [
  "id",
  "title",
  "content",
  "price",
  "currency",
  "url",
  "scraped_at",
] as const satisfies readonly (keyof CleanedRecord)[];

export type CleanedField = (typeof CLEANED_FIELDS)[number];

/** Violation codes in reporting order */
export const VIOLATION_CODES = [
  "MISSING_TITLE",
  "MISSING_CONTENT",
  "CONTENT_TOO_SHORT",
  "MISSING_URL",
  "INVALID_URL",
  "INVALID_PRICE",
  "INVALID_DATE",
] as const;

export type ViolationCode = (typeof VIOLATION_CODES)[number];

/** Validation result for a single record (index is 1-based) */
export interface RecordOutcome {
  index: number;
  id: string | null;
  violations: ViolationCode[];
}

export interface IssueCount {
  code: ViolationCode;
  count: number;
}

/** Aggregate statistics rendered into the quality report */
export interface QualityReport {
  total_records: number;
  valid_records: number;
  invalid_records: number;
  total_violations: number;
  completeness: Record<CleanedField, number>;
  issues: IssueCount[];
  records: RecordOutcome[];
}

/** Pipeline stage, used to label fatal input errors */
export type Stage = "cleaner" | "validator";

/** Options for the clean command */
export interface CleanConfig {
  inputPath: string;
  outputPath: string;
}

/** Options for the validate command */
export interface ValidateConfig {
  inputPath: string;
  reportPath: string;
  summaryPath: string | null;
  details: boolean;
}
