import { DateTime } from "luxon";
import type { CleanedRecord, ViolationCode } from "../types";
import { nonBlank } from "../core/utils";

/** Minimum trimmed length of "content", in characters */
export const MIN_CONTENT_LENGTH = 30;

/** One-line explanation printed beside each code in the report details */
export const VIOLATION_MESSAGES: Record<ViolationCode, string> = {
  MISSING_TITLE: "Title is missing or empty.",
  MISSING_CONTENT: "Content is missing or empty.",
  CONTENT_TOO_SHORT: `Content must be at least ${MIN_CONTENT_LENGTH} characters long.`,
  MISSING_URL: "URL is missing or empty.",
  INVALID_URL: "URL should start with http:// or https://.",
  INVALID_PRICE: "Price must be a non-negative number.",
  INVALID_DATE: "scraped_at should be a calendar date (YYYY-MM-DD).",
};

function isIsoDate(text: string): boolean {
  return (
    /^\d{4}-\d{2}-\d{2}$/.test(text) &&
    DateTime.fromFormat(text, "yyyy-MM-dd", { zone: "utc" }).isValid
  );
}

/**
 * Validate a single cleaned record.
 * Every rule runs; codes come back in taxonomy order. Null price and
 * null scraped_at are allowed, only present-but-bad values are flagged.
 */
export function validateRecord(record: CleanedRecord): ViolationCode[] {
  const violations: ViolationCode[] = [];
  const title = nonBlank(record.title);
  const content = nonBlank(record.content);
  const url = nonBlank(record.url);
  const scrapedAt = nonBlank(record.scraped_at);
  const { price } = record;

  if (title === null) violations.push("MISSING_TITLE");

  if (content === null) {
    violations.push("MISSING_CONTENT");
  } else if (Array.from(content).length < MIN_CONTENT_LENGTH) {
    violations.push("CONTENT_TOO_SHORT");
  }

  if (url === null) {
    violations.push("MISSING_URL");
  } else if (!url.startsWith("http://") && !url.startsWith("https://")) {
    violations.push("INVALID_URL");
  }

  if (price !== null && (!Number.isFinite(price) || price < 0)) {
    violations.push("INVALID_PRICE");
  }

  if (scrapedAt !== null && !isIsoDate(scrapedAt)) {
    violations.push("INVALID_DATE");
  }

  return violations;
}
