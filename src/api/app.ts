import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { json } from "body-parser";
import multer from "multer";
import type { ToolConfig } from "../config/tool.config";
import { DatasetReadError } from "../ingest/dataset-builder";
import { logger } from "../utils/logger";
import { registerRoutes } from "./routes";

export function createApp(config: ToolConfig) {
  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(json({ limit: "10mb" }));

  registerRoutes(app, config);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof DatasetReadError) {
      res.status(400).json({ error: err.message });
      return;
    }

    if (err instanceof multer.MulterError) {
      const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      res.status(status).json({ error: err.message });
      return;
    }

    logger.error({ err, path: req.path }, "request failed");
    res.status(500).json({ error: err instanceof Error ? err.message : "Internal error" });
  });

  return app;
}
