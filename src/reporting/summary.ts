import type { DetectionMethod, Finding, RiskCategory } from "../detector/detector.types";
import { roundTo2 } from "../detector/risk-scorer";

export type FindingsSummary = {
  totalColumns: number;
  flaggedColumns: number;
  byCategory: Record<RiskCategory, number>;
  byPiiType: Record<string, number>;
  byMethod: Partial<Record<Exclude<DetectionMethod, "None">, number>>;
  averageRiskScore: number;
  highestRisk: { column: string; piiType: string; riskScore: number } | null;
};

export function summarizeFindings(findings: readonly Finding[], totalColumns: number): FindingsSummary {
  const byCategory: Record<RiskCategory, number> = { High: 0, Medium: 0, Low: 0 };
  const byPiiType: Record<string, number> = {};
  const byMethod: FindingsSummary["byMethod"] = {};
  let highest: Finding | null = null;
  let total = 0;

  for (const f of findings) {
    byCategory[f.riskCategory]++;
    byPiiType[f.piiType] = (byPiiType[f.piiType] ?? 0) + 1;
    byMethod[f.detectionMethod] = (byMethod[f.detectionMethod] ?? 0) + 1;
    total += f.riskScore;

    // first column wins ties
    if (highest === null || f.riskScore > highest.riskScore) highest = f;
  }

  return {
    totalColumns,
    flaggedColumns: findings.length,
    byCategory,
    byPiiType,
    byMethod,
    averageRiskScore: findings.length === 0 ? 0 : roundTo2(total / findings.length),
    highestRisk: highest
      ? { column: highest.columnName, piiType: highest.piiType, riskScore: highest.riskScore }
      : null,
  };
}
