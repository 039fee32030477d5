import type { CleanedRecord, RawRecord } from "../types";
import { trimmedOrNull } from "../core/utils";
import { normalizeText } from "./text";
import { normalizeCurrency, parsePrice } from "./price";
import { parseDate } from "./date";

/**
 * Transform a single raw scraped record into the fixed cleaned shape.
 *
 * Expected raw fields (all optional, all noisy):
 *   - "id"          scalar, trimmed
 *   - "title"       text, may contain HTML and line breaks
 *   - "content"     text; the legacy "description" key is used when it is empty
 *   - "price"       number, or string with a currency symbol/code
 *   - "currency"    explicit code or symbol, wins over the one in "price"
 *   - "url"         string, trimmed only
 *   - "scraped_at"  date in one of the accepted shapes
 */
export function cleanRecord(raw: RawRecord): CleanedRecord {
  const { price, currency } = parsePrice(raw.price);

  return {
    id: trimmedOrNull(raw.id),
    title: normalizeText(raw.title),
    content: normalizeText(raw.content) ?? normalizeText(raw.description),
    price,
    currency: normalizeCurrency(raw.currency) ?? currency,
    url: trimmedOrNull(raw.url),
    scraped_at: parseDate(raw.scraped_at),
  };
}

/**
 * Clean every record, one output per input, in input order.
 */
export function cleanDataset(records: RawRecord[]): CleanedRecord[] {
  return records.map(cleanRecord);
}
