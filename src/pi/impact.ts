import { isPiiType, type PiiType } from "../detector/detector.types";

export const DEFAULT_IMPACT = 2;

/** Harm if exposed, 1 (low) to 5 (severe). */
export const IMPACT_SCORES: Readonly<Record<PiiType, number>> = Object.freeze({
  SSN: 5,
  CREDIT_CARD: 5,
  NATIONAL_ID: 5,
  MEDICAL: 5,
  EMAIL: 4,
  PHONE: 4,
  ADDRESS: 4,
  GPS_COORDINATES: 4,
  IBAN: 4,
  DATE_OF_BIRTH: 3,
  DOB: 3,
  NAME: 3,
  SALARY: 3,
  ID: 2,
  AGE: 2,
  GENDER: 2,
  IP_ADDRESS: 2,
  URL: 1,
});

export function impactFor(piiType: string): number {
  return isPiiType(piiType) ? IMPACT_SCORES[piiType] : DEFAULT_IMPACT;
}
