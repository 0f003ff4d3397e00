import type { ReportFormat } from "../reporting/report-writer";

export const REPORT_BASENAME = "pii-risk.report";

export const REPORT_FILES: Readonly<Record<ReportFormat, string>> = Object.freeze({
  json: `${REPORT_BASENAME}.json`,
  yaml: `${REPORT_BASENAME}.yaml`,
  csv: `${REPORT_BASENAME}.csv`,
  xlsx: `${REPORT_BASENAME}.xlsx`,
});

export const BUNDLE_FILE = `${REPORT_BASENAME}.zip`;
