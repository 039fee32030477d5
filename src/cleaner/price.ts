import type { RawValue } from "../types";

export interface ParsedPrice {
  price: number | null;
  currency: string | null;
}

/** ISO 4217 codes recognised inside price strings and currency fields */
export const CURRENCY_CODES = [
  "USD",
  "EUR",
  "GBP",
  "JPY",
  "CHF",
  "CAD",
  "AUD",
  "CZK",
  "PLN",
  "SEK",
  "NOK",
  "DKK",
  "HUF",
  "INR",
  "CNY",
] as const;

/** Symbols and the code each one stands for. Longer symbols first. */
export const CURRENCY_SYMBOLS: ReadonlyArray<[symbol: string, code: string]> = [
  ["US$", "USD"],
  ["Kč", "CZK"],
  ["zł", "PLN"],
  ["$", "USD"],
  ["€", "EUR"],
  ["£", "GBP"],
  ["¥", "JPY"],
  ["₹", "INR"],
];

const CODE_PATTERN = new RegExp(
  `(?<![A-Za-z])(${CURRENCY_CODES.join("|")})(?![A-Za-z])`,
  "gi"
);

const SYMBOL_PATTERN = new RegExp(
  CURRENCY_SYMBOLS.map(([symbol]) => symbol.replace(/\$/g, "\\$")).join("|"),
  "g"
);

/**
 * First numeric run: optional sign, digits with "." or "," separators,
 * and space/apostrophe thousands groups ("1 250,00", "1'000").
 */
const NUMBER_PATTERN = /-?\d(?:[\d.,]|[ \u00a0'](?=\d{3}(?!\d)))*/;

function symbolToCode(symbol: string): string | null {
  const hit = CURRENCY_SYMBOLS.find(([s]) => s === symbol);
  return hit ? hit[1] : null;
}

/**
 * Find the currency in a price string: an ISO code wins over a symbol.
 * @param text - Raw price text such as "USD 10.50" or "19,99 €"
 */
export function extractCurrency(text: string): string | null {
  const code = text.match(new RegExp(CODE_PATTERN.source, "i"));
  if (code) return code[1].toUpperCase();

  const symbol = text.match(new RegExp(SYMBOL_PATTERN.source));
  if (symbol) return symbolToCode(symbol[0]);

  return null;
}

/**
 * Resolve an explicit currency field: a known symbol or any three-letter code.
 * @param value - Raw value of the record's currency key
 */
export function normalizeCurrency(value: RawValue | undefined): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  const fromSymbol = symbolToCode(trimmed);
  if (fromSymbol) return fromSymbol;
  return /^[A-Za-z]{3}$/.test(trimmed) ? trimmed.toUpperCase() : null;
}

/**
 * Turn a numeric run into a JS number, deciding which separator is decimal.
 * - both "." and "," present: the later one is the decimal mark
 * - commas only: "1,250" and "1,250,000" are grouped, "19,99" is decimal
 * - dots only: one dot is decimal, several are grouping
 */
export function parseNumber(run: string): number | null {
  let s = run.replace(/[ \u00a0']/g, "").replace(/[.,]+$/, "");
  const lastDot = s.lastIndexOf(".");
  const lastComma = s.lastIndexOf(",");

  if (lastDot !== -1 && lastComma !== -1) {
    const decimal = lastDot > lastComma ? "." : ",";
    const group = decimal === "." ? "," : ".";
    s = s.split(group).join("").replace(decimal, ".");
  } else if (lastComma !== -1) {
    const commas = s.split(",").length - 1;
    const grouped = commas > 1 || s.length - lastComma - 1 === 3;
    s = grouped ? s.split(",").join("") : s.replace(",", ".");
  } else if (lastDot !== -1) {
    const dots = s.split(".").length - 1;
    if (dots > 1) s = s.split(".").join("");
  }

  const num = Number(s);
  return Number.isFinite(num) ? num : null;
}

/**
 * Parse a scraped price into a number and a currency code.
 * Numbers pass through unchanged; strings may carry a symbol or ISO code
 * on either side of the amount. The amount and the currency are parsed
 * independently, so either may be null. Sign is not judged here.
 * @param value - Raw price value
 */
export function parsePrice(value: RawValue | undefined): ParsedPrice {
  if (typeof value === "number") {
    return { price: Number.isFinite(value) ? value : null, currency: null };
  }
  if (typeof value !== "string") {
    return { price: null, currency: null };
  }

  const text = value.trim();
  const currency = extractCurrency(text);

  const amount = text.replace(CODE_PATTERN, "").replace(SYMBOL_PATTERN, "");
  const match = amount.match(NUMBER_PATTERN);
  const price = match ? parseNumber(match[0]) : null;

  return { price, currency };
}
