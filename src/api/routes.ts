import type { Writable } from "stream";
import type { Express, Request, Response } from "express";
import type archiver from "archiver";
import { z } from "zod";
import multer from "multer";
import { validate } from "./validators";
import type { ToolConfig } from "../config/tool.config";
import { BUNDLE_FILE, REPORT_FILES } from "../config/constants";
import { analyzeDataset } from "../detector/dataset-analyzer";
import type { Dataset } from "../detector/detector.types";
import { buildDataset, DatasetReadError, previewDataset } from "../ingest/dataset-builder";
import { readDatasetFromBuffer } from "../ingest/file-reader";
import { toReportRow } from "../reporting/report-row";
import {
  buildReport,
  CONTENT_TYPES,
  createReportBundle,
  renderReport,
} from "../reporting/report-writer";
import { summarizeFindings } from "../reporting/summary";
import { COLUMN_TYPE_GROUPS } from "../schema/type-mapper";
import { logger } from "../utils/logger";

const CellZ = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const AnalyzeJsonZ = z.object({
  body: z.object({
    columns: z
      .array(
        z.object({
          name: z.string().min(1),
          dataType: z.enum(COLUMN_TYPE_GROUPS).optional(),
          values: z.array(CellZ),
        })
      )
      .min(1),
  }),
});

const EXPORT_FORMATS = ["json", "yaml", "csv", "xlsx", "zip"] as const;

const ExportZ = z.object({
  query: z.object({
    format: z.enum(EXPORT_FORMATS).default("json"),
  }),
});

type UploadedFile = NonNullable<Request["file"]>;

function requireUpload(file: UploadedFile | undefined): UploadedFile {
  if (!file) throw new DatasetReadError("Missing file");
  return file;
}

function analyze(dataset: Dataset) {
  const findings = analyzeDataset(dataset);
  const summary = summarizeFindings(findings, dataset.columns.length);
  return { findings, summary };
}

function sendDownload(res: Response, fileName: string, contentType: string, body: string | Buffer) {
  res.setHeader("Content-Type", contentType);
  res.setHeader("Content-Disposition", `attachment; filename="${fileName}"`);
  res.send(body);
}

/** Archiver errors are logged and destroy `out`. */
export function pipeBundle(archive: archiver.Archiver, out: Writable) {
  archive.on("error", (err) => {
    logger.error({ err }, "report bundle failed");
    out.destroy(err);
  });
  archive.pipe(out);
}

export function registerRoutes(app: Express, config: ToolConfig) {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes },
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // 1) Upload a CSV/XLSX → findings + masked preview
  app.post("/analyze", upload.single("file"), async (req, res) => {
    const file = requireUpload(req.file);
    const dataset = readDatasetFromBuffer(file.buffer, file.originalname);
    const { findings, summary } = analyze(dataset);

    logger.info(`Analyzed ${file.originalname}: ${findings.length}/${dataset.columns.length} columns flagged`);

    res.json({
      fileName: file.originalname,
      preview: previewDataset(dataset, config.previewRows),
      findings: findings.map(toReportRow),
      summary,
    });
  });

  // 2) Already-parsed columns as JSON
  app.post(
    "/analyze/json",
    validate(AnalyzeJsonZ, (input, _req, res) => {
      const { findings, summary } = analyze(buildDataset(input.body.columns));
      res.json({ findings: findings.map(toReportRow), summary });
    })
  );

  // 3) Upload → downloadable report (json | yaml | csv | xlsx | zip bundle)
  app.post(
    "/export",
    upload.single("file"),
    validate(ExportZ, async (input, req, res) => {
      const file = requireUpload(req.file);
      const dataset = readDatasetFromBuffer(file.buffer, file.originalname);
      const { findings, summary } = analyze(dataset);
      const report = buildReport(file.originalname, findings, summary);
      const format = input.query.format;

      if (format === "zip") {
        res.setHeader("Content-Type", "application/zip");
        res.setHeader("Content-Disposition", `attachment; filename="${BUNDLE_FILE}"`);

        const archive = createReportBundle(report, file.originalname.replace(/\.[^.]+$/, ""));
        pipeBundle(archive, res);
        await archive.finalize();
        return;
      }

      sendDownload(res, REPORT_FILES[format], CONTENT_TYPES[format], renderReport(report, format, dataset));
    })
  );
}
