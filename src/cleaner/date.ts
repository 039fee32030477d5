import { DateTime } from "luxon";
import type { RawValue } from "../types";

/** Tries one input shape; returns YYYY-MM-DD or null when it does not apply */
type DateMatcher = (text: string) => string | null;

const ISO_DATE = "yyyy-MM-dd";

function fromFormat(format: string): DateMatcher {
  return (text) => {
    const dt = DateTime.fromFormat(text, format, { locale: "en-US", zone: "utc" });
    return dt.isValid ? dt.toFormat(ISO_DATE) : null;
  };
}

/** Keep the calendar date of a timestamp as written, whatever its offset. */
const timestamp: DateMatcher = (text) => {
  const m = text.match(/^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/);
  return m ? fromFormat(ISO_DATE)(m[1]) : null;
};

/**
 * Accepted input shapes in priority order. Month-first beats day-first for
 * slash dates, so "03/04/2024" is March 4th while "25/12/2024" falls
 * through to the day-first matcher.
 */
export const DATE_MATCHERS: readonly DateMatcher[] = [
  fromFormat(ISO_DATE),
  fromFormat("yyyy/MM/dd"),
  fromFormat("yyyy.MM.dd"),
  timestamp,
  fromFormat("M/d/yyyy"),
  fromFormat("d/M/yyyy"),
  fromFormat("d-M-yyyy"),
  fromFormat("d.M.yyyy"),
  fromFormat("d MMM yyyy"),
  fromFormat("d MMMM yyyy"),
  fromFormat("MMM d, yyyy"),
  fromFormat("MMMM d, yyyy"),
];

/**
 * Rewrite a scraped date to YYYY-MM-DD.
 * Unknown shapes and impossible calendar dates give null.
 * @param value - Raw date value; only strings are considered
 */
export function parseDate(value: RawValue | undefined): string | null {
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text) return null;

  for (const match of DATE_MATCHERS) {
    const iso = match(text);
    if (iso) return iso;
  }
  return null;
}

