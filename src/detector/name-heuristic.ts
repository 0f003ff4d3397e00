import { COLUMN_KEYWORDS, NON_PII_KEYWORDS } from "../pi/keywords";
import { isPiiType, NO_DETECTION, type DetectionSignal, type PiiType } from "./detector.types";

export const EXACT_CONFIDENCE = 0.9;
export const TOKEN_CONFIDENCE = 0.8;
export const SEGMENT_CONFIDENCE = 0.7;

type KeywordEntry = { piiType: PiiType; keyword: string };

function hasToken(name: string, keyword: string): boolean {
  return name.includes(`_${keyword}`) || name.includes(`${keyword}_`);
}

// Longest keyword first so "employee_id" is tried before "id".
// Array.prototype.sort is stable, so equal lengths keep library order.
const SORTED_KEYWORDS: readonly KeywordEntry[] = Object.freeze(
  Object.entries(COLUMN_KEYWORDS)
    .flatMap(([piiType, keywords]): KeywordEntry[] =>
      isPiiType(piiType) ? keywords.map((keyword) => ({ piiType, keyword })) : []
    )
    .sort((a, b) => b.keyword.length - a.keyword.length)
);

export function isExcludedColumnName(normalized: string): boolean {
  return NON_PII_KEYWORDS.some((k) => k === normalized || hasToken(normalized, k));
}

function keywordConfidence(name: string, keyword: string): number {
  if (keyword === name) return EXACT_CONFIDENCE;
  if (hasToken(name, keyword)) return TOKEN_CONFIDENCE;

  const segments = name.split("_");
  if (keyword === segments[0] || keyword === segments[segments.length - 1]) {
    return SEGMENT_CONFIDENCE;
  }
  return 0;
}

export function detectColumnNameHeuristic(columnName: string): DetectionSignal {
  const name = columnName.toLowerCase().trim();

  if (isExcludedColumnName(name)) return NO_DETECTION;

  for (const { piiType, keyword } of SORTED_KEYWORDS) {
    if (!name.includes(keyword)) continue;

    const confidence = keywordConfidence(name, keyword);
    if (confidence > 0) return { piiType, confidence };
  }

  return NO_DETECTION;
}
