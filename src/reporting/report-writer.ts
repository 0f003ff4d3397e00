import fs from "fs";
import archiver from "archiver";
import * as XLSX from "xlsx";
import * as YAML from "yaml";
import type { Dataset, Finding } from "../detector/detector.types";
import { datasetRows } from "../ingest/dataset-builder";
import { REPORT_COLUMNS, toReportRow, type ReportRow } from "./report-row";
import type { FindingsSummary } from "./summary";

export const REPORT_FORMATS = ["json", "yaml", "csv", "xlsx"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const CONTENT_TYPES: Readonly<Record<ReportFormat, string>> = {
  json: "application/json; charset=utf-8",
  yaml: "application/yaml; charset=utf-8",
  csv: "text/csv; charset=utf-8",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
};

export const FINDINGS_SHEET = "PII analysis";
export const SAMPLE_SHEET = "Dataset sample";
export const SAMPLE_SHEET_ROWS = 100;

export type AnalysisReport = {
  generatedAt: string;
  source: string;
  summary: FindingsSummary;
  findings: ReportRow[];
};

export function buildReport(source: string, findings: readonly Finding[], summary: FindingsSummary): AnalysisReport {
  return {
    generatedAt: new Date().toISOString(),
    source,
    summary,
    findings: findings.map(toReportRow),
  };
}

function findingsSheet(rows: readonly ReportRow[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet([...rows], { header: [...REPORT_COLUMNS] });
}

function sampleSheet(dataset: Dataset): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(datasetRows(dataset, SAMPLE_SHEET_ROWS), {
    header: dataset.columns.map((c) => c.name),
  });
}

export function toYamlString(obj: unknown): string {
  const doc = new YAML.Document(obj);
  return doc.toString({ indent: 2 });
}

/**
 * `source` is the scanned dataset; the xlsx workbook gets a second sheet
 * with its first rows. Text formats ignore it.
 */
export function renderReport(report: AnalysisReport, format: ReportFormat, source?: Dataset): string | Buffer {
  switch (format) {
    case "json":
      return JSON.stringify(report, null, 2);
    case "yaml":
      return toYamlString(report);
    case "csv":
      return XLSX.utils.sheet_to_csv(findingsSheet(report.findings));
    case "xlsx": {
      const wb = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(wb, findingsSheet(report.findings), FINDINGS_SHEET);
      if (source) XLSX.utils.book_append_sheet(wb, sampleSheet(source), SAMPLE_SHEET);
      const buf: Buffer = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
      return buf;
    }
  }
}

export function writeReport(filePath: string, report: AnalysisReport, format: ReportFormat, source?: Dataset) {
  const out = renderReport(report, format, source);
  if (typeof out === "string") fs.writeFileSync(filePath, out, "utf8");
  else fs.writeFileSync(filePath, out);
}

/** CSV, JSON and YAML renderings of one report, zipped. */
export function createReportBundle(report: AnalysisReport, baseName: string): archiver.Archiver {
  const archive = archiver("zip", { zlib: { level: 9 } });

  for (const format of ["csv", "json", "yaml"] as const) {
    archive.append(renderReport(report, format), { name: `${baseName}.${format}` });
  }

  return archive;
}
