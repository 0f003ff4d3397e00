import { isMissing } from "../schema/type-mapper";
import type { CellValue } from "./detector.types";

// 1 and "1" stay distinct; dates compare by instant.
function distinctKey(v: Exclude<CellValue, null | undefined>): string {
  if (v instanceof Date) return `date:${v.getTime()}`;
  return `${typeof v}:${String(v)}`;
}

export function countDistinct(values: readonly CellValue[]): number {
  const seen = new Set<string>();
  for (const v of values) {
    if (isMissing(v)) continue;
    seen.add(distinctKey(v));
  }
  return seen.size;
}

export function countMissing(values: readonly CellValue[]): number {
  return values.filter(isMissing).length;
}

/**
 * Distinct non-missing values over every row, missing rows included in the
 * denominator.
 */
export function calculateUniqueness(values: readonly CellValue[]): number {
  if (values.length === 0) return 0;
  return countDistinct(values) / values.length;
}
