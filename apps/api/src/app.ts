import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";

import type { AppConfig } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";
import { createReportRouter, sendError } from "./routes/report.js";
import type { ReportPipeline } from "./services/reportPipeline.js";

export function createApp(params: { config: AppConfig; pipeline: ReportPipeline; logger?: Logger }): express.Express {
  const logger = params.logger ?? silentLogger;

  const app = express();
  app.use(cors({ origin: params.config.webOrigin }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));
  app.use("/api", createReportRouter({ pipeline: params.pipeline, logger }));

  // Upload middleware failures (size limit, unexpected field) arrive here.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, err, logger);
  });

  return app;
}
