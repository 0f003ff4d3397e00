#!/usr/bin/env node
import "dotenv/config";
import path from "path";
import { parseArgs } from "./cli/args";
import { loadDbConfig, loadToolConfig } from "./config/tool.config";
import { withPgClient } from "./db/postgres.client";
import { logger } from "./utils/logger";

import { analyzeDataset } from "./detector/dataset-analyzer";
import type { Dataset } from "./detector/detector.types";
import { readDatasetFile } from "./ingest/file-reader";
import { readDatasetFromTable } from "./ingest/table-reader";
import { rowCount } from "./ingest/dataset-builder";
import { buildReport, writeReport } from "./reporting/report-writer";
import { summarizeFindings } from "./reporting/summary";

import { REPORT_FILES } from "./config/constants";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const toolConfig = loadToolConfig();

  logger.info(`Running scanner in "${args.mode}" mode on ${args.target}`);

  // -----------------------------
  // INGEST
  // -----------------------------
  let dataset: Dataset;
  if (args.mode === "scan") {
    dataset = readDatasetFile(args.target);
  } else {
    dataset = await withPgClient(loadDbConfig(), (client) =>
      readDatasetFromTable(client, { table: args.target, limit: toolConfig.sampleLimit })
    );
  }

  logger.info(`Loaded ${rowCount(dataset)} rows x ${dataset.columns.length} columns`);

  // -----------------------------
  // ANALYZE
  // -----------------------------
  const findings = analyzeDataset(dataset);
  const summary = summarizeFindings(findings, dataset.columns.length);

  if (findings.length === 0) {
    logger.info("No PII columns detected");
  } else {
    logger.info(
      `Flagged ${findings.length} of ${summary.totalColumns} columns ` +
        `(high: ${summary.byCategory.High}, medium: ${summary.byCategory.Medium}, low: ${summary.byCategory.Low})`
    );
    for (const f of findings) {
      logger.info(
        `${f.columnName}: ${f.piiType} via ${f.detectionMethod}, risk ${f.riskScore.toFixed(2)} (${f.riskCategory})`
      );
    }
  }

  // -----------------------------
  // REPORT
  // -----------------------------
  const outPath = args.out ?? path.join(toolConfig.reportDir, REPORT_FILES[args.format]);
  writeReport(outPath, buildReport(args.target, findings, summary), args.format, dataset);

  logger.info(`Report written to ${outPath}`);
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
