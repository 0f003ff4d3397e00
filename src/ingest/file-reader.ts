import fs from "fs";
import path from "path";
import * as XLSX from "xlsx";
import type { CellValue, Dataset } from "../detector/detector.types";
import type { ColumnTypeGroup } from "../schema/type-mapper";
import { buildDataset, DatasetReadError, normalizeHeaders, type RawColumn } from "./dataset-builder";

const TEXT_EXTENSIONS = new Set([".csv", ".txt"]);
const SHEET_EXTENSIONS = new Set([".xlsx", ".xls"]);

export const SUPPORTED_EXTENSIONS = [...TEXT_EXTENSIONS, ...SHEET_EXTENSIONS];

// Markers read as missing in delimited text.
const NA_VALUES = new Set([
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
]);

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;
const BOOLEAN = /^(?:true|false)$/i;

// Comma only; SheetJS would otherwise guess the separator from the first line.
const CSV_READ_OPTIONS = { type: "string", raw: true, FS: "," } as const;

// Integers past 2^53 keep their digits so distinct IDs stay distinct.
function toNumberCell(s: string): CellValue {
  const t = s.trim();
  const n = Number(t);
  return INTEGER.test(t) && !Number.isSafeInteger(n) ? t : n;
}

function toCell(v: unknown): CellValue {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (v instanceof Date) return v;
  return String(v);
}

/**
 * Delimited text arrives as strings; a column is numeric or boolean only
 * when every present value parses that way.
 */
export function typeTextColumn(raw: readonly CellValue[]): { dataType: ColumnTypeGroup; values: CellValue[] } {
  const values: (string | null)[] = raw.map((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v);
    return NA_VALUES.has(s.trim()) ? null : s;
  });

  const present = values.filter((v): v is string => v !== null);
  if (present.length === 0) return { dataType: "OTHER", values };

  if (present.every((s) => NUMERIC.test(s.trim()))) {
    return { dataType: "NUMBER", values: values.map((s) => (s === null ? null : toNumberCell(s))) };
  }

  if (present.every((s) => BOOLEAN.test(s.trim()))) {
    return {
      dataType: "BOOLEAN",
      values: values.map((s) => (s === null ? null : s.trim().toLowerCase() === "true")),
    };
  }

  return { dataType: "STRING", values };
}

/** Delimited text keeps all-empty rows (e.g. ","): they are records with every value missing. */
function sheetRows(workbook: XLSX.WorkBook, blankrows: boolean): unknown[][] {
  const first = workbook.SheetNames[0];
  if (first === undefined) throw new DatasetReadError("Workbook contains no sheets");

  return XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[first], {
    header: 1,
    defval: null,
    raw: true,
    blankrows,
  });
}

function rowsToColumns(rows: unknown[][], textual: boolean): RawColumn[] {
  if (rows.length === 0) throw new DatasetReadError("No columns to parse from file");

  const [header, ...body] = rows;
  const width = rows.reduce((max, r) => Math.max(max, r.length), 0);
  const names = normalizeHeaders(header, width);

  return names.map((name, i): RawColumn => {
    const raw = body.map((r) => toCell(r[i]));
    if (textual) return { name, ...typeTextColumn(raw) };

    // spreadsheet cells keep their native types; blank strings still count as missing
    return { name, values: raw.map((v) => (typeof v === "string" && v.trim() === "" ? null : v)) };
  });
}

export function readDatasetFromBuffer(buffer: Buffer, fileName: string): Dataset {
  const ext = path.extname(fileName).toLowerCase();

  if (TEXT_EXTENSIONS.has(ext)) {
    const text = buffer
      .toString("utf8")
      .replace(/^\uFEFF/, "")
      .replace(/(?:\r?\n)+$/, "\n");
    const workbook = XLSX.read(text, CSV_READ_OPTIONS);
    return buildDataset(rowsToColumns(sheetRows(workbook, true), true));
  }

  if (SHEET_EXTENSIONS.has(ext)) {
    const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
    return buildDataset(rowsToColumns(sheetRows(workbook, false), false));
  }

  throw new DatasetReadError(
    `Unsupported file type "${ext || fileName}". Use one of: ${SUPPORTED_EXTENSIONS.join(", ")}`
  );
}

export function readDatasetFile(filePath: string): Dataset {
  if (!fs.existsSync(filePath)) throw new DatasetReadError(`File not found: ${filePath}`);
  return readDatasetFromBuffer(fs.readFileSync(filePath), path.basename(filePath));
}
