import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { calculateUniqueness } from "../../src/detector/uniqueness";
import { DatasetReadError, normalizeHeaders, previewDataset, rowCount } from "../../src/ingest/dataset-builder";
import { readDatasetFromBuffer, typeTextColumn } from "../../src/ingest/file-reader";

describe("typeTextColumn", () => {
  it("converts all-numeric columns and treats NA markers as missing", () => {
    expect(typeTextColumn(["1", "2.5", null, "NA"])).toEqual({ dataType: "NUMBER", values: [1, 2.5, null, null] });
  });

  it("recognizes boolean columns regardless of case", () => {
    expect(typeTextColumn(["True", "false"])).toEqual({ dataType: "BOOLEAN", values: [true, false] });
  });

  it("keeps mixed columns as text", () => {
    expect(typeTextColumn(["1", "a"])).toEqual({ dataType: "STRING", values: ["1", "a"] });
  });

  it("keeps integers beyond the safe range as their digits", () => {
    expect(typeTextColumn(["9007199254740993", "9007199254740992", "7"])).toEqual({
      dataType: "NUMBER",
      values: ["9007199254740993", "9007199254740992", 7],
    });
  });

  it("marks all-missing columns as OTHER", () => {
    expect(typeTextColumn([null, ""])).toEqual({ dataType: "OTHER", values: [null, null] });
  });
});

describe("normalizeHeaders", () => {
  it("names blank headers and suffixes duplicates", () => {
    expect(normalizeHeaders(["id", null, "id", "", "id"], 6)).toEqual([
      "id",
      "Unnamed: 1",
      "id.1",
      "Unnamed: 3",
      "id.2",
      "Unnamed: 5",
    ]);
  });
});

describe("readDatasetFromBuffer", () => {
  it("reads a CSV into typed columns", () => {
    const csv = "name,age,email\nAlice,30,alice@example.com\nBob,41,bob@example.com\n";
    const dataset = readDatasetFromBuffer(Buffer.from(csv, "utf8"), "people.csv");

    expect(dataset.columns.map((c) => [c.name, c.dataType])).toEqual([
      ["name", "STRING"],
      ["age", "NUMBER"],
      ["email", "STRING"],
    ]);
    expect(dataset.columns[1].values).toEqual([30, 41]);
    expect(dataset.columns[2].values).toEqual(["alice@example.com", "bob@example.com"]);
    expect(rowCount(dataset)).toBe(2);
  });

  it("splits on commas even when the header holds more semicolons", () => {
    const csv = "notes;x,email\na;b;c,a@x.org\nd;e,b@y.org\n";
    const dataset = readDatasetFromBuffer(Buffer.from(csv, "utf8"), "notes.csv");

    expect(dataset.columns.map((c) => c.name)).toEqual(["notes;x", "email"]);
    expect(dataset.columns[0].values).toEqual(["a;b;c", "d;e"]);
  });

  it("keeps rows whose cells are all empty", () => {
    const csv = "email,b\na@x.org,1\n,\nb@y.org,2\n";
    const dataset = readDatasetFromBuffer(Buffer.from(csv, "utf8"), "rows.csv");

    expect(dataset.columns[0].values).toEqual(["a@x.org", null, "b@y.org"]);
    expect(dataset.columns[1].values).toEqual([1, null, 2]);
    expect(rowCount(dataset)).toBe(3);
    expect(calculateUniqueness(dataset.columns[0].values)).toBeCloseTo(2 / 3);
  });

  it("ignores trailing blank lines", () => {
    const dataset = readDatasetFromBuffer(Buffer.from("id\n1\n2\n\n\n", "utf8"), "ids.csv");
    expect(dataset.columns[0].values).toEqual([1, 2]);
  });

  it("keeps large integer IDs distinct", () => {
    const csv = "customer_id\n9007199254740993\n9007199254740992\n";
    const dataset = readDatasetFromBuffer(Buffer.from(csv, "utf8"), "ids.csv");

    expect(dataset.columns[0]).toEqual({
      name: "customer_id",
      dataType: "NUMBER",
      values: ["9007199254740993", "9007199254740992"],
    });
    expect(calculateUniqueness(dataset.columns[0].values)).toBe(1);
  });

  it("reads the first sheet of a workbook with native cell types", () => {
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet([
        ["email", "score"],
        ["a@x.org", 1],
        ["b@y.org", 2],
      ]),
      "Data"
    );
    const buf: Buffer = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });

    const dataset = readDatasetFromBuffer(buf, "scores.xlsx");
    expect(dataset.columns).toEqual([
      { name: "email", dataType: "STRING", values: ["a@x.org", "b@y.org"] },
      { name: "score", dataType: "NUMBER", values: [1, 2] },
    ]);
  });

  it("rejects unsupported file types", () => {
    expect(() => readDatasetFromBuffer(Buffer.from("{}"), "data.json")).toThrow(DatasetReadError);
    expect(() => readDatasetFromBuffer(Buffer.from("{}"), "data.json")).toThrow('Unsupported file type ".json"');
  });
});

describe("previewDataset", () => {
  it("masks values and limits rows", () => {
    const preview = previewDataset(
      {
        columns: [
          { name: "email", dataType: "STRING", values: ["alice@example.com", null, "bob@example.com"] },
          { name: "tag", dataType: "STRING", values: ["red", "blue", "green"] },
        ],
      },
      2
    );

    expect(preview).toEqual({
      rows: 3,
      columns: 2,
      sample: [
        { email: "al***om", tag: "***" },
        { email: null, tag: "***" },
      ],
    });
  });
});
