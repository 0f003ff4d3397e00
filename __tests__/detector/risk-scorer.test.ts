import { describe, it, expect } from "vitest";
import { calculateRiskScore, categorizeRisk, roundTo2 } from "../../src/detector/risk-scorer";
import { calculateUniqueness, countDistinct, countMissing } from "../../src/detector/uniqueness";
import { impactFor } from "../../src/pi/impact";
import { recommendAction } from "../../src/pi/recommendations";

describe("calculateRiskScore", () => {
  it("multiplies impact and uniqueness by 20", () => {
    expect(calculateRiskScore(3, 0.5)).toBe(30);
    expect(calculateRiskScore(4, 0.75)).toBe(60);
  });

  it("caps at 100 and is 0 without uniqueness", () => {
    expect(calculateRiskScore(5, 1)).toBe(100);
    expect(calculateRiskScore(5, 0)).toBe(0);
  });
});

describe("categorizeRisk", () => {
  it("closes each tier on its upper bound", () => {
    expect(categorizeRisk(0)).toBe("Low");
    expect(categorizeRisk(30)).toBe("Low");
    expect(categorizeRisk(30.01)).toBe("Medium");
    expect(categorizeRisk(70)).toBe("Medium");
    expect(categorizeRisk(70.01)).toBe("High");
    expect(categorizeRisk(100)).toBe("High");
  });
});

describe("roundTo2", () => {
  it("rounds to two decimals", () => {
    expect(roundTo2(66.66666)).toBe(66.67);
    expect(roundTo2(45)).toBe(45);
  });
});

describe("uniqueness", () => {
  it("is 0 for an empty column", () => {
    expect(calculateUniqueness([])).toBe(0);
  });

  it("keeps missing values in the denominator only", () => {
    expect(calculateUniqueness(["a", "a", "b", null])).toBe(0.5);
    expect(calculateUniqueness([null, NaN])).toBe(0);
  });

  it("distinguishes values of different types", () => {
    expect(countDistinct([1, "1", 1])).toBe(2);
    expect(countDistinct([new Date(0), new Date(0)])).toBe(1);
  });

  it("counts null, undefined and NaN as missing", () => {
    expect(countMissing([null, undefined, NaN, "", 0])).toBe(3);
  });
});

describe("impactFor", () => {
  it("looks up the table and falls back to 2", () => {
    expect(impactFor("SSN")).toBe(5);
    expect(impactFor("URL")).toBe(1);
    expect(impactFor("PASSPORT")).toBe(2);
    expect(impactFor("toString")).toBe(2);
  });
});

describe("recommendAction", () => {
  it("prefixes the per-type action with an urgency marker", () => {
    expect(recommendAction("SSN", "High")).toBe("🔴 URGENT: Tokenization or full masking (e.g., ***-**-1234)");
    expect(recommendAction("NAME", "Medium")).toBe("🟡 Pseudonymization or tokenization");
    expect(recommendAction("AGE", "Low")).toBe("🟢 Generalization to age ranges (e.g., 20-30)");
  });

  it("falls back to a generic action for unmapped types", () => {
    expect(recommendAction("PASSPORT", "Low")).toBe("🟢 Apply appropriate anonymization technique");
  });
});
