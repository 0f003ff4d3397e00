import type { PiiType } from "../detector/detector.types";

export type KeywordPiiType = Extract<
  PiiType,
  | "EMAIL"
  | "PHONE"
  | "NAME"
  | "ID"
  | "DOB"
  | "ADDRESS"
  | "SSN"
  | "CREDIT_CARD"
  | "GENDER"
  | "AGE"
  | "SALARY"
  | "MEDICAL"
>;

export const COLUMN_KEYWORDS: Readonly<Record<KeywordPiiType, readonly string[]>> = Object.freeze({
  EMAIL: ["email", "e-mail", "mail", "email_address", "e_mail"],
  PHONE: ["phone", "telephone", "mobile", "cell", "contact_number", "phone_num", "phone_number"],
  // "full_name" resolves through the "name" token
  NAME: [
    "name",
    "firstname",
    "lastname",
    "first_name",
    "last_name",
    "username",
    "patient_name",
    "customer_name",
    "employee_name",
  ],
  ID: ["patient_id", "customer_id", "employee_id", "user_id", "person_id", "id_number", "national_id"],
  DOB: ["dob", "birth", "birthdate", "date_of_birth", "birthday", "birth_date"],
  ADDRESS: [
    "address",
    "street",
    "location",
    "residence",
    "home_address",
    "street_address",
    "physical_address",
  ],
  SSN: ["ssn", "social_security", "social_security_number"],
  CREDIT_CARD: ["credit_card", "cc", "card_number", "creditcard", "card_num"],
  GENDER: ["gender", "sex"],
  AGE: ["age"],
  SALARY: ["salary", "income", "wage", "compensation", "pay"],
  MEDICAL: [
    "medical_condition",
    "diagnosis",
    "medication",
    "blood_type",
    "medical",
    "condition",
    "disease",
    "illness",
  ],
});

/** Names that describe free text or classification, never a person. */
export const NON_PII_KEYWORDS: readonly string[] = Object.freeze([
  "essay",
  "description",
  "comment",
  "notes",
  "text",
  "content",
  "body",
  "message",
  "post",
  "article",
  "paragraph",
  "statement",
  "summary",
  "review",
  "feedback",
  "provider",
  "company",
  "organization",
  "department",
  "title",
  "category",
  "type",
  "status",
  "role",
]);
