import { PII_PATTERNS, PATTERN_PRIORITY, PATTERN_TYPES, type PatternPiiType } from "../pi/patterns";
import { isMissing, isTextualGroup } from "../schema/type-mapper";
import { logger } from "../utils/logger";
import { NO_DETECTION, type CellValue, type DatasetColumn, type DetectionSignal } from "./detector.types";

/** Columns averaging more than this are prose, even when they mention PII. */
export const MAX_MEAN_LENGTH = 500;

/** First sampled value longer than this disables every pattern candidate. */
export const MAX_SAMPLE_LENGTH = 200;

export const CANDIDATE_RATIO = 0.3;
export const ACCEPT_RATIO = 0.5;

function cellToText(v: CellValue): string {
  if (v instanceof Date) return v.toISOString();
  return String(v);
}

function textLength(s: string): number {
  // code points, so an emoji counts once
  return Array.from(s).length;
}

function matchRatio(pattern: RegExp, texts: readonly string[]): number {
  let matches = 0;
  for (const t of texts) {
    if (pattern.test(t)) matches++;
  }
  return matches / texts.length;
}

/**
 * Match ratio per pattern, keeping only the ones that clear the candidate threshold.
 * Insertion order follows PATTERN_TYPES.
 */
export function candidateRatios(texts: readonly string[]): Map<PatternPiiType, number> {
  const candidates = new Map<PatternPiiType, number>();
  if (texts.length === 0) return candidates;

  // Only the first value is sampled for the density guard.
  const sampleTooLong = textLength(texts[0]) > MAX_SAMPLE_LENGTH;

  for (const piiType of PATTERN_TYPES) {
    let ratio: number;
    try {
      ratio = matchRatio(PII_PATTERNS[piiType], texts);
    } catch (err) {
      logger.debug({ err, piiType }, "pattern evaluation failed, treating as no match");
      continue;
    }

    if (ratio > CANDIDATE_RATIO) {
      if (sampleTooLong) continue;
      candidates.set(piiType, ratio);
    }
  }

  return candidates;
}

export function detectPatternBased(column: DatasetColumn): DetectionSignal {
  if (!isTextualGroup(column.dataType)) return NO_DETECTION;

  const texts = column.values.filter((v) => !isMissing(v)).map(cellToText);
  if (texts.length === 0) return NO_DETECTION;

  const meanLength = texts.reduce((sum, t) => sum + textLength(t), 0) / texts.length;
  if (meanLength > MAX_MEAN_LENGTH) return NO_DETECTION;

  const candidates = candidateRatios(texts);
  if (candidates.size === 0) return NO_DETECTION;

  for (const piiType of PATTERN_PRIORITY) {
    const ratio = candidates.get(piiType);
    if (ratio !== undefined && ratio > ACCEPT_RATIO) {
      return { piiType, confidence: ratio };
    }
  }

  let best: DetectionSignal = NO_DETECTION;
  for (const [piiType, ratio] of candidates) {
    if (best.piiType === null || ratio > best.confidence) {
      best = { piiType, confidence: ratio };
    }
  }

  return best.confidence > ACCEPT_RATIO ? best : NO_DETECTION;
}
