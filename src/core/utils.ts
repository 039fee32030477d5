import type { RawValue } from "../types";

/**
 * Trimmed text of a cleaned string field, or null when it is null or blank.
 * @param value - A cleaned field value
 */
export function nonBlank(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

/**
 * Render a scalar raw value as a string. Nested values and null give null.
 * @param value - Raw value from a scraped record
 */
export function scalarToString(value: RawValue | undefined): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : null;
  if (typeof value === "boolean") return String(value);
  return null;
}

/**
 * Trim a scalar raw value, mapping empty results to null.
 * @param value - Raw value from a scraped record
 */
export function trimmedOrNull(value: RawValue | undefined): string | null {
  return nonBlank(scalarToString(value));
}

/**
 * Round a percentage to one decimal place.
 */
export function roundPercent(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
