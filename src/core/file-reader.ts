import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import type { RawRecord, Stage } from "../types";
import { InputShapeError } from "./errors";
import { parseDataset } from "./dataset";
import { getErrorMessage } from "./utils";

/**
 * Read a dataset from a JSON, CSV or XLSX file and check its shape.
 * @param filePath  Absolute or relative path to the file.
 * @param stage  Stage name used in shape errors.
 */
export function readDataset(filePath: string, stage: Stage): RawRecord[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".json") {
    return parseDataset(readJson(filePath, stage), stage);
  } else if (ext === ".csv") {
    return parseDataset(readCsv(filePath), stage);
  } else if (ext === ".xlsx" || ext === ".xls") {
    return parseDataset(readXlsx(filePath), stage);
  } else {
    throw new Error(
      `Unsupported file type "${ext}". Only .json, .csv and .xlsx/.xls are supported.`
    );
  }
}

// ── Internals ────────────────────────────────────────────────────────────────

function stripBom(raw: string): string {
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}

function readJson(filePath: string, stage: Stage): unknown {
  const content = stripBom(fs.readFileSync(filePath, "utf-8"));
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new InputShapeError(stage, `input is not valid JSON (${getErrorMessage(err)})`);
  }
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
export function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ",") {
        fields.push(current);
        current = "";
      } else {
        current += ch;
      }
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Header row gives the keys; cells missing from a short row are left out.
 * Fields may not span lines.
 */
export function parseCsv(content: string): Record<string, string>[] {
  const lines = stripBom(content)
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "");
  if (lines.length === 0) return [];

  const headers = parseCsvRow(lines[0]).map((h) => h.trim());
  const rows: Record<string, string>[] = [];
  for (let i = 1; i < lines.length; i++) {
    const fields = parseCsvRow(lines[i]);
    const row: Record<string, string> = {};
    headers.forEach((header, idx) => {
      if (header && idx < fields.length) row[header] = fields[idx];
    });
    rows.push(row);
  }
  return rows;
}

function readCsv(filePath: string): Record<string, string>[] {
  return parseCsv(fs.readFileSync(filePath, "utf-8"));
}

function readXlsx(filePath: string): unknown[] {
  const wb = XLSX.readFile(filePath);
  const sheetName = wb.SheetNames[0];
  if (!sheetName) return [];

  // first row is headers; empty cells are omitted from each row object
  return XLSX.utils.sheet_to_json<unknown>(wb.Sheets[sheetName], { raw: true });
}
