import * as cheerio from "cheerio";
import type { RawValue } from "../types";
import { scalarToString } from "../core/utils";

const TAG_PATTERN = /<[^>]+>/g;

/** Upper bound on decode passes for multiply-escaped input */
const MAX_PASSES = 10;

/**
 * One normalisation pass: NFKC, then HTML parsed with each tag leaving a
 * word break, entities decoded once, script/style bodies discarded,
 * tag-shaped leftovers dropped and whitespace collapsed.
 */
function normalizePass(text: string): string {
  const padded = text.normalize("NFKC").replace(TAG_PATTERN, (tag) => ` ${tag} `);
  const $ = cheerio.load(padded, null, false);
  $("script, style").remove();

  return $.root()
    .text()
    .replace(TAG_PATTERN, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Normalise a scraped text value.
 * Passes repeat until the text stops changing, so "&amp;amp;" ends up as
 * "&" and the result is a fixed point of this function.
 * Returns null when nothing is left.
 * @param value - Raw value; arrays and objects are not text
 */
export function normalizeText(value: RawValue | undefined): string | null {
  const str = scalarToString(value);
  if (str === null) return null;

  let text = normalizePass(str);
  for (let pass = 1; pass < MAX_PASSES; pass++) {
    const next = normalizePass(text);
    if (next === text) break;
    text = next;
  }

  return text === "" ? null : text;
}
