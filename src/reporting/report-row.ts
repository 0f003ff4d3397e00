import type { Finding } from "../detector/detector.types";

/** Presentation shape; header names are what spreadsheets and the UI show. */
export type ReportRow = {
  "Column Name": string;
  "PII Type": string;
  "Detection Method": string;
  Confidence: string;
  Impact: number;
  Uniqueness: string;
  "Risk Score": string;
  "Risk Category": string;
  "Recommended Action": string;
  "Data Type": string;
  "Unique Values": number;
  "Null Count": number;
};

export const REPORT_COLUMNS: readonly (keyof ReportRow)[] = [
  "Column Name",
  "PII Type",
  "Detection Method",
  "Confidence",
  "Impact",
  "Uniqueness",
  "Risk Score",
  "Risk Category",
  "Recommended Action",
  "Data Type",
  "Unique Values",
  "Null Count",
];

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function toReportRow(f: Finding): ReportRow {
  return {
    "Column Name": f.columnName,
    "PII Type": f.piiType,
    "Detection Method": f.detectionMethod,
    Confidence: formatPercent(f.confidence),
    Impact: f.impact,
    Uniqueness: formatPercent(f.uniqueness),
    "Risk Score": f.riskScore.toFixed(2),
    "Risk Category": f.riskCategory,
    "Recommended Action": f.recommendedAction,
    "Data Type": f.dataType,
    "Unique Values": f.uniqueValues,
    "Null Count": f.nullCount,
  };
}
