import type { ColumnTypeGroup } from "../schema/type-mapper";

export type CellValue = string | number | boolean | Date | null | undefined;

export type DatasetColumn = {
  name: string;
  dataType: ColumnTypeGroup;
  values: readonly CellValue[];
};

export type Dataset = {
  columns: readonly DatasetColumn[];
};

export const PII_TYPES = [
  "EMAIL",
  "PHONE",
  "SSN",
  "CREDIT_CARD",
  "IP_ADDRESS",
  "URL",
  "DATE_OF_BIRTH",
  "NATIONAL_ID",
  "GPS_COORDINATES",
  "IBAN",
  "ADDRESS",
  "NAME",
  "ID",
  "DOB",
  "GENDER",
  "AGE",
  "SALARY",
  "MEDICAL",
] as const;

export type PiiType = (typeof PII_TYPES)[number];

export type DetectionMethod = "Pattern-Based" | "Column-Name Heuristic" | "None";

export type RiskCategory = "Low" | "Medium" | "High";

/** Output of one detector; `piiType: null` always carries confidence 0. */
export type DetectionSignal = {
  piiType: PiiType | null;
  confidence: number;
};

export const NO_DETECTION: DetectionSignal = Object.freeze({ piiType: null, confidence: 0 });

export type Finding = Readonly<{
  columnName: string;
  piiType: PiiType;
  detectionMethod: Exclude<DetectionMethod, "None">;
  /** ratio in [0, 1] */
  confidence: number;
  impact: number;
  /** ratio in [0, 1] */
  uniqueness: number;
  riskScore: number;
  riskCategory: RiskCategory;
  recommendedAction: string;
  dataType: ColumnTypeGroup;
  uniqueValues: number;
  nullCount: number;
}>;

export function isPiiType(value: string): value is PiiType {
  return PII_TYPES.some((t) => t === value);
}
