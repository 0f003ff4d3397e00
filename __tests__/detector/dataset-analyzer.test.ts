import { describe, it, expect } from "vitest";
import { analyzeDataset, reconcileSignals } from "../../src/detector/dataset-analyzer";
import type { Dataset, DatasetColumn } from "../../src/detector/detector.types";

const ssn: DatasetColumn = {
  name: "ssn",
  dataType: "STRING",
  values: ["123-45-6789", "234-56-7890", "345-67-8901", "456-78-9012"],
};

const fullName: DatasetColumn = {
  name: "full_name",
  dataType: "STRING",
  values: ["Alice Smith", "Bob Jones", "Carol White", "Alice Smith"],
};

const category: DatasetColumn = {
  name: "category",
  dataType: "STRING",
  values: Array.from({ length: 1000 }, (_, i) => ["red", "green", "blue"][i % 3]),
};

describe("reconcileSignals", () => {
  it("gives ties to the name heuristic", () => {
    const r = reconcileSignals({ piiType: "EMAIL", confidence: 0.6 }, { piiType: "NAME", confidence: 0.6 });
    expect(r).toEqual({ piiType: "NAME", confidence: 0.6, detectionMethod: "Column-Name Heuristic" });
  });

  it("adopts the pattern only when strictly more confident", () => {
    const r = reconcileSignals({ piiType: "EMAIL", confidence: 0.61 }, { piiType: "NAME", confidence: 0.6 });
    expect(r).toEqual({ piiType: "EMAIL", confidence: 0.61, detectionMethod: "Pattern-Based" });
  });

  it("reports None only when both detectors are silent", () => {
    const none = { piiType: null, confidence: 0 };
    expect(reconcileSignals(none, none)).toEqual({ piiType: null, confidence: 0, detectionMethod: "None" });
  });
});

describe("analyzeDataset", () => {
  it("scores an SSN column found by pattern", () => {
    const [finding] = analyzeDataset({ columns: [ssn] });

    expect(finding).toEqual({
      columnName: "ssn",
      piiType: "SSN",
      detectionMethod: "Pattern-Based",
      confidence: 1,
      impact: 5,
      uniqueness: 1,
      riskScore: 100,
      riskCategory: "High",
      recommendedAction: "🔴 URGENT: Tokenization or full masking (e.g., ***-**-1234)",
      dataType: "STRING",
      uniqueValues: 4,
      nullCount: 0,
    });
  });

  it("leaves low-cardinality category columns out", () => {
    expect(analyzeDataset({ columns: [category] })).toEqual([]);
  });

  it("falls back to the column-name heuristic for free-text names", () => {
    const [finding] = analyzeDataset({ columns: [fullName] });

    expect(finding.piiType).toBe("NAME");
    expect(finding.detectionMethod).toBe("Column-Name Heuristic");
    expect(finding.confidence).toBe(0.8);
    expect(finding.impact).toBe(3);
    expect(finding.uniqueness).toBe(0.75);
    expect(finding.riskScore).toBe(45);
    expect(finding.riskCategory).toBe("Medium");
    expect(finding.uniqueValues).toBe(3);
  });

  it("scores numeric columns through their name alone", () => {
    const dataset: Dataset = {
      columns: [{ name: "age", dataType: "NUMBER", values: [25, 30, 25, 40] }],
    };
    const [finding] = analyzeDataset(dataset);

    expect(finding.piiType).toBe("AGE");
    expect(finding.confidence).toBe(0.9);
    expect(finding.riskScore).toBe(30);
    expect(finding.riskCategory).toBe("Low");
    expect(finding.recommendedAction).toBe("🟢 Generalization to age ranges (e.g., 20-30)");
  });

  it("counts missing values and keeps them in the uniqueness denominator", () => {
    const dataset: Dataset = {
      columns: [{ name: "contact", dataType: "STRING", values: ["a@x.org", "b@y.org", null, "c@z.org"] }],
    };
    const [finding] = analyzeDataset(dataset);

    expect(finding.piiType).toBe("EMAIL");
    expect(finding.detectionMethod).toBe("Pattern-Based");
    expect(finding.uniqueness).toBe(0.75);
    expect(finding.riskScore).toBe(60);
    expect(finding.riskCategory).toBe("Medium");
    expect(finding.nullCount).toBe(1);
  });

  it("keeps source column order and drops unflagged columns", () => {
    const findings = analyzeDataset({ columns: [fullName, category, ssn] });
    expect(findings.map((f) => f.columnName)).toEqual(["full_name", "ssn"]);
  });

  it("returns frozen findings", () => {
    const [finding] = analyzeDataset({ columns: [ssn] });
    expect(Object.isFrozen(finding)).toBe(true);
  });
});
