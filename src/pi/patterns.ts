import type { PiiType } from "../detector/detector.types";

export type PatternPiiType = Extract<
  PiiType,
  | "EMAIL"
  | "PHONE"
  | "SSN"
  | "CREDIT_CARD"
  | "IP_ADDRESS"
  | "URL"
  | "DATE_OF_BIRTH"
  | "NATIONAL_ID"
  | "GPS_COORDINATES"
  | "IBAN"
  | "ADDRESS"
>;

// Word characters and digits follow Unicode, so "é123-45-6789" has no boundary before the 1.
const WORD = String.raw`[\p{L}\p{N}_]`;
const BOUNDARY = `(?:(?<=${WORD})(?!${WORD})|(?<!${WORD})(?=${WORD}))`;
const DIGIT = String.raw`\p{Nd}`;

function unicodePattern(source: string): RegExp {
  return new RegExp(source.replace(/\\b/g, BOUNDARY).replace(/\\d/g, DIGIT), "u");
}

// Non-global on purpose: RegExp.test on a /g pattern carries lastIndex between calls.
export const PII_PATTERNS: Readonly<Record<PatternPiiType, RegExp>> = Object.freeze({
  EMAIL: unicodePattern(String.raw`\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b`),
  PHONE: unicodePattern(String.raw`(?:\+?\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b`),
  SSN: unicodePattern(String.raw`\b\d{3}-\d{2}-\d{4}\b`),
  CREDIT_CARD: unicodePattern(String.raw`\b(?:\d{4}[-\s]?){3}\d{4}\b|\b\d{13,19}\b`),
  IP_ADDRESS: unicodePattern(String.raw`\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b`),
  URL: unicodePattern(
    String.raw`https?:\/\/(?:www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b(?:[-a-zA-Z0-9()@:%_+.~#?&\/=]*)`
  ),
  DATE_OF_BIRTH: unicodePattern(String.raw`\b\d{1,2}[-\/]\d{1,2}[-\/]\d{2,4}\b`),
  NATIONAL_ID: unicodePattern(String.raw`\b[A-Z0-9]{8,12}\b`),
  GPS_COORDINATES: unicodePattern(String.raw`[-+]?\d{1,3}\.\d+,\s*[-+]?\d{1,3}\.\d+`),
  IBAN: unicodePattern(String.raw`\b[A-Z]{2}\d{2}[A-Z0-9]{4,30}\b`),
  ADDRESS: unicodePattern(String.raw`\d+\s+[A-Za-z\s]+(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Drive|Dr|Lane|Ln)`),
});

/** Library order; ties on match ratio resolve to the earlier entry. */
export const PATTERN_TYPES: readonly PatternPiiType[] = Object.freeze([
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
]);

/**
 * More specific shapes first: a 16-digit card number also satisfies the
 * generic long-digit and phone shapes.
 */
export const PATTERN_PRIORITY: readonly PatternPiiType[] = Object.freeze([
  "CREDIT_CARD",
  "SSN",
  "IBAN",
  "EMAIL",
  "PHONE",
  "IP_ADDRESS",
  "GPS_COORDINATES",
  "DATE_OF_BIRTH",
  "NATIONAL_ID",
  "ADDRESS",
  "URL",
]);

//  Previews never leak raw values.

export function maskSample(s: string): string {
  if (!s) return s;

  //  show first 2 + last 2, mask middle
  if (s.length <= 6) return "***";
  return `${s.slice(0, 2)}***${s.slice(-2)}`;
}
