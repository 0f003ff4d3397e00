import { isPiiType, type PiiType, type RiskCategory } from "../detector/detector.types";

export const DEFAULT_RECOMMENDATION = "Apply appropriate anonymization technique";

export const RECOMMENDATIONS: Readonly<Record<PiiType, string>> = Object.freeze({
  SSN: "Tokenization or full masking (e.g., ***-**-1234)",
  CREDIT_CARD: "Tokenization or partial masking (e.g., ****-****-****-1234)",
  NATIONAL_ID: "Tokenization or hashing with salt",
  EMAIL: "Hashing or partial masking (e.g., j***@example.com)",
  PHONE: "Masking last 4 digits (e.g., ***-***-1234)",
  ADDRESS: "Generalization to city/region level",
  GPS_COORDINATES: "Reduce precision to neighborhood level",
  DATE_OF_BIRTH: "Generalization to birth year only",
  DOB: "Generalization to birth year only",
  NAME: "Pseudonymization or tokenization",
  ID: "Tokenization or hashing",
  SALARY: "Generalization to salary ranges",
  MEDICAL: "Remove or encrypt; strict access control required",
  IBAN: "Tokenization or partial masking",
  IP_ADDRESS: "Remove last octet (e.g., 192.168.1.***)",
  URL: "Domain extraction only if needed",
  AGE: "Generalization to age ranges (e.g., 20-30)",
  GENDER: "Keep if necessary for analysis; consider aggregation",
});

export const URGENCY_MARKERS: Readonly<Record<RiskCategory, string>> = Object.freeze({
  High: "🔴 URGENT: ",
  Medium: "🟡 ",
  Low: "🟢 ",
});

export function recommendAction(piiType: string, riskCategory: RiskCategory): string {
  const base = isPiiType(piiType) ? RECOMMENDATIONS[piiType] : DEFAULT_RECOMMENDATION;
  return `${URGENCY_MARKERS[riskCategory]}${base}`;
}
