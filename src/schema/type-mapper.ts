// src/schema/type-mapper.ts

import type { CellValue } from "../detector/detector.types";

export const COLUMN_TYPE_GROUPS = ["STRING", "NUMBER", "BOOLEAN", "DATE", "JSON", "UUID", "OTHER"] as const;

export type ColumnTypeGroup = (typeof COLUMN_TYPE_GROUPS)[number];

const NON_TEXTUAL: ReadonlySet<ColumnTypeGroup> = new Set<ColumnTypeGroup>(["NUMBER", "BOOLEAN", "DATE"]);

/**
 * Pattern matching only runs over columns whose values are text.
 * OTHER stays textual: mixed or unknown columns are stringified before matching.
 */
export function isTextualGroup(group: ColumnTypeGroup): boolean {
  return !NON_TEXTUAL.has(group);
}

export function isMissing(v: CellValue): v is null | undefined {
  return v === null || v === undefined || (typeof v === "number" && Number.isNaN(v));
}

export function mapPgToGroup(dataType: string, udtName?: string): ColumnTypeGroup {
  const dt = (dataType || "").toLowerCase();
  const udt = (udtName || "").toLowerCase();

  // Prefer udt_name when available (e.g., int4, int8, bool, uuid)
  const t = udt || dt;

  // STRING-ish
  if (
    dt.includes("character") ||
    dt.includes("text") ||
    t.includes("varchar") ||
    t.includes("bpchar") ||
    t.includes("char") ||
    t === "citext"
  ) {
    return "STRING";
  }

  // NUMBER-ish
  if (
    t.includes("int") ||
    t.includes("numeric") ||
    t.includes("decimal") ||
    t.includes("float") ||
    t.includes("double") ||
    t.includes("real")
  ) {
    return "NUMBER";
  }

  // BOOLEAN
  if (t === "bool" || dt === "boolean") return "BOOLEAN";

  // DATE/TIME
  if (
    dt.includes("timestamp") ||
    dt.includes("date") ||
    dt.includes("time")
  ) {
    return "DATE";
  }

  // JSON
  if (t === "json" || t === "jsonb" || dt === "json" || dt === "jsonb") return "JSON";

  // UUID
  if (t === "uuid" || dt === "uuid") return "UUID";

  return "OTHER";
}

/**
 * Declared type for values that arrive without one (uploaded JSON, spreadsheets).
 * A column is only non-textual when every non-missing value agrees.
 */
export function inferGroupFromValues(values: readonly CellValue[]): ColumnTypeGroup {
  const present = values.filter((v) => !isMissing(v));
  if (present.length === 0) return "OTHER";

  if (present.every((v) => typeof v === "number")) return "NUMBER";
  if (present.every((v) => typeof v === "boolean")) return "BOOLEAN";
  if (present.every((v) => v instanceof Date)) return "DATE";
  if (present.every((v) => typeof v === "string")) return "STRING";

  return "OTHER";
}
