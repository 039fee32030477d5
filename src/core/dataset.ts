import { z } from "zod";
import type { CleanedRecord, RawRecord, RawValue, Stage } from "../types";
import { InputShapeError } from "./errors";
import { scalarToString } from "./utils";

const rawValueSchema: z.ZodType<RawValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(rawValueSchema),
    z.record(rawValueSchema),
  ])
);

const rawRecordSchema = z.record(rawValueSchema);

function describe(data: unknown): string {
  if (data === null) return "null";
  if (Array.isArray(data)) return "array";
  return typeof data;
}

/**
 * Check that decoded input is an array of record objects.
 * @param data - Decoded input (JSON, CSV rows or sheet rows)
 * @param stage - Stage name used in the error
 * @throws InputShapeError when the top level or any element has the wrong shape
 */
export function parseDataset(data: unknown, stage: Stage): RawRecord[] {
  if (!Array.isArray(data)) {
    throw new InputShapeError(
      stage,
      `expected a top-level array of records, got ${describe(data)}`
    );
  }

  const records: RawRecord[] = [];
  for (let i = 0; i < data.length; i++) {
    const result = rawRecordSchema.safeParse(data[i]);
    if (!result.success) {
      throw new InputShapeError(
        stage,
        `record at index ${i} is not an object (got ${describe(data[i])})`
      );
    }
    records.push(result.data);
  }
  return records;
}

function priceValue(value: RawValue | undefined): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : Number(trimmed);
  }
  return NaN;
}

/**
 * Read a validator input record as a CleanedRecord.
 * Foreign value types are kept visible to the rules: a non-numeric price
 * becomes NaN rather than null.
 */
export function toCleanedRecord(record: RawRecord): CleanedRecord {
  return {
    id: scalarToString(record.id),
    title: scalarToString(record.title),
    content: scalarToString(record.content),
    price: priceValue(record.price),
    currency: scalarToString(record.currency),
    url: scalarToString(record.url),
    scraped_at: scalarToString(record.scraped_at),
  };
}
