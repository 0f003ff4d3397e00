import type { RiskCategory } from "./detector.types";

export const RISK_MULTIPLIER = 20;
export const MAX_RISK_SCORE = 100;

export const LOW_RISK_CEILING = 30;
export const MEDIUM_RISK_CEILING = 70;

/** Severity of exposure amplified by how re-identifying the column is. */
export function calculateRiskScore(impact: number, uniqueness: number): number {
  return Math.min(RISK_MULTIPLIER * impact * uniqueness, MAX_RISK_SCORE);
}

export function categorizeRisk(riskScore: number): RiskCategory {
  if (riskScore <= LOW_RISK_CEILING) return "Low";
  if (riskScore <= MEDIUM_RISK_CEILING) return "Medium";
  return "High";
}

export function roundTo2(n: number): number {
  return Math.round(n * 100) / 100;
}
