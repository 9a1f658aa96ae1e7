import express from "express";
import type { Response } from "express";
import multer from "multer";
import { z } from "zod";

import { ReportError, UpstreamGenerationError, ValidationError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ReportPipeline } from "../services/reportPipeline.js";

export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

const ReportQuerySchema = z.object({
  format: z.enum(["pdf", "html"]).default("pdf")
});

export function createReportRouter(params: { pipeline: ReportPipeline; logger?: Logger }): express.Router {
  const logger = (params.logger ?? silentLogger).child({ component: "reportRoute" });
  const router = express.Router();

  router.post("/report", upload.single("file"), async (req, res) => {
    const startedAt = Date.now();
    try {
      const query = ReportQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError("Invalid query parameters", { issues: query.error.flatten().fieldErrors });
      }

      const file = req.file;
      if (!file) throw new ValidationError('Missing CSV upload. Send it in the "file" field.');
      const input = { buffer: file.buffer, filename: file.originalname };

      if (query.data.format === "html") {
        const report = await params.pipeline.generateReportHtml(input);
        logger.info({ format: "html", kind: report.context.kind, ms: Date.now() - startedAt }, "report served");
        return res.type("html").send(report.html);
      }

      const report = await params.pipeline.generateReport(input);
      logger.info(
        { format: "pdf", kind: report.context.kind, bytes: report.pdf.length, ms: Date.now() - startedAt },
        "report served"
      );
      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", contentDisposition(report.filename));
      return res.send(report.pdf);
    } catch (err: unknown) {
      return sendError(res, err, logger);
    }
  });

  return router;
}

export function contentDisposition(filename: string): string {
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `attachment; filename*=UTF-8''${encoded}`;
}

export function sendError(res: Response, err: unknown, logger: Logger = silentLogger): Response {
  if (err instanceof multer.MulterError) {
    const message =
      err.code === "LIMIT_FILE_SIZE"
        ? `The uploaded file is larger than ${MAX_UPLOAD_BYTES / (1024 * 1024)} MB.`
        : `Upload rejected: ${err.message}`;
    return res.status(400).json({ error: message, code: "validation", details: { reason: err.code, field: err.field } });
  }

  if (err instanceof UpstreamGenerationError) {
    const { status, code, type } = err.upstream;
    const details = { ...err.upstream };
    logger.warn({ upstream: details }, "report generation failed");

    // If OpenAI rejects before processing, dashboards can show "0 tokens used".
    if (status === 429 && (code === "insufficient_quota" || type === "insufficient_quota")) {
      return res.status(402).json({
        error:
          "OpenAI API rejected the request due to insufficient quota for the project/org tied to this API key. " +
          "Enable billing for that project/org or generate a key under a billed project, then retry.",
        code: err.code,
        details
      });
    }
    if (status === 429) {
      return res.status(429).json({
        error: "OpenAI rate limit exceeded. Slow down requests or retry later.",
        code: err.code,
        details
      });
    }
    if (status === 401 || status === 403) {
      return res.status(401).json({
        error: "OpenAI authentication/authorization failed. Check OPENAI_API_KEY and project permissions.",
        code: err.code,
        details
      });
    }
    return res.status(err.statusCode).json({ error: err.message, code: err.code, details });
  }

  if (err instanceof ReportError) {
    if (err.statusCode >= 500) logger.error({ err }, "report request failed");
    return res.status(err.statusCode).json({ error: err.message, code: err.code, details: err.details });
  }

  logger.error({ err }, "unhandled error");
  return res.status(500).json({ error: "Internal error", code: "internal" });
}
