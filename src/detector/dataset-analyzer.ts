import { impactFor } from "../pi/impact";
import { recommendAction } from "../pi/recommendations";
import { logger } from "../utils/logger";
import {
  NO_DETECTION,
  type Dataset,
  type DatasetColumn,
  type DetectionMethod,
  type DetectionSignal,
  type Finding,
  type PiiType,
} from "./detector.types";
import { detectColumnNameHeuristic } from "./name-heuristic";
import { detectPatternBased } from "./pattern-detector";
import { calculateRiskScore, categorizeRisk, roundTo2 } from "./risk-scorer";
import { calculateUniqueness, countDistinct, countMissing } from "./uniqueness";

export type ReconciledSignal = {
  piiType: PiiType | null;
  confidence: number;
  detectionMethod: DetectionMethod;
};

/**
 * Pattern wins only on a strict greater-than; a tie goes to the name heuristic.
 */
export function reconcileSignals(pattern: DetectionSignal, heuristic: DetectionSignal): ReconciledSignal {
  if (pattern.confidence > heuristic.confidence) {
    return { ...pattern, detectionMethod: "Pattern-Based" };
  }
  if (heuristic.confidence > 0) {
    return { ...heuristic, detectionMethod: "Column-Name Heuristic" };
  }
  return { ...NO_DETECTION, detectionMethod: "None" };
}

export function analyzeColumn(column: DatasetColumn): Finding | null {
  const signal = reconcileSignals(
    detectPatternBased(column),
    detectColumnNameHeuristic(column.name)
  );

  if (signal.piiType === null || signal.detectionMethod === "None") return null;

  const uniqueness = calculateUniqueness(column.values);
  const impact = impactFor(signal.piiType);
  const riskScore = calculateRiskScore(impact, uniqueness);
  const riskCategory = categorizeRisk(riskScore);

  return Object.freeze({
    columnName: column.name,
    piiType: signal.piiType,
    detectionMethod: signal.detectionMethod,
    confidence: signal.confidence,
    impact,
    uniqueness,
    riskScore: roundTo2(riskScore),
    riskCategory,
    recommendedAction: recommendAction(signal.piiType, riskCategory),
    dataType: column.dataType,
    uniqueValues: countDistinct(column.values),
    nullCount: countMissing(column.values),
  });
}

/**
 * One finding per flagged column, in source column order.
 * Columns with no adopted PII type are left out.
 */
export function analyzeDataset(dataset: Dataset): Finding[] {
  // slot per column index, so order never depends on evaluation order
  const slots: (Finding | null)[] = dataset.columns.map(analyzeColumn);
  const findings = slots.filter((f): f is Finding => f !== null);

  logger.debug(
    { columns: dataset.columns.length, flagged: findings.length },
    "dataset analyzed"
  );

  return findings;
}
