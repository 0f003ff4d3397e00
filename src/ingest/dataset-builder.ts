import type { CellValue, Dataset, DatasetColumn } from "../detector/detector.types";
import { maskSample } from "../pi/patterns";
import { inferGroupFromValues, isMissing, type ColumnTypeGroup } from "../schema/type-mapper";

export class DatasetReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetReadError";
  }
}

export type RawColumn = {
  name: string;
  dataType?: ColumnTypeGroup;
  values: readonly CellValue[];
};

/** Blank headers become "Unnamed: <index>", repeats get ".1", ".2" suffixes. */
export function normalizeHeaders(raw: readonly unknown[], width: number): string[] {
  const seen = new Map<string, number>();
  const names: string[] = [];

  for (let i = 0; i < width; i++) {
    const cell = raw[i];
    const base =
      cell === null || cell === undefined || String(cell).trim() === ""
        ? `Unnamed: ${i}`
        : String(cell);

    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    names.push(count === 0 ? base : `${base}.${count}`);
  }

  return names;
}

export function buildDataset(columns: readonly RawColumn[]): Dataset {
  const names = new Set<string>();
  for (const c of columns) {
    if (names.has(c.name)) throw new DatasetReadError(`Duplicate column name "${c.name}"`);
    names.add(c.name);
  }

  return {
    columns: columns.map(
      (c): DatasetColumn => ({
        name: c.name,
        dataType: c.dataType ?? inferGroupFromValues(c.values),
        values: c.values,
      })
    ),
  };
}

export function rowCount(dataset: Dataset): number {
  return dataset.columns.reduce((max, c) => Math.max(max, c.values.length), 0);
}

/** First `limit` rows as records keyed by column name, values untouched. */
export function datasetRows(dataset: Dataset, limit: number): Record<string, CellValue>[] {
  const out: Record<string, CellValue>[] = [];
  const rows = Math.min(limit, rowCount(dataset));

  for (let r = 0; r < rows; r++) {
    const row: Record<string, CellValue> = {};
    for (const c of dataset.columns) {
      const v = c.values[r];
      row[c.name] = isMissing(v) ? null : v;
    }
    out.push(row);
  }
  return out;
}

export type DatasetPreview = {
  rows: number;
  columns: number;
  sample: Record<string, string | null>[];
};

export function previewDataset(dataset: Dataset, limit: number): DatasetPreview {
  const rows = rowCount(dataset);
  const sample: Record<string, string | null>[] = [];

  for (let r = 0; r < Math.min(limit, rows); r++) {
    const row: Record<string, string | null> = {};
    for (const c of dataset.columns) {
      const v = c.values[r];
      row[c.name] = isMissing(v) ? null : maskSample(v instanceof Date ? v.toISOString() : String(v));
    }
    sample.push(row);
  }

  return { rows, columns: dataset.columns.length, sample };
}
