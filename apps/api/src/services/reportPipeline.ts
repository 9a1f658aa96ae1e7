import fs from "fs/promises";
import path from "path";

import type { AppConfig } from "../config.js";
import { silentLogger, type Logger } from "../logger.js";
import { renderAbsoluteChart, renderDifferentialChart } from "./emotionCharts.js";
import { loadLogoAsset } from "./reportAssets.js";
import { assembleReportDocument } from "./reportDocument.js";
import type { ReportTextGenerator } from "./reportGenerator.js";
import { getReportStrings } from "./reportLocale.js";
import { renderReportPdf, type RenderOptions } from "./reportPdf.js";
import { buildReportPrompt } from "./reportPrompt.js";
import type { ReportContext } from "./reportSchema.js";
import { parseSessionCsv } from "./sessionCsv.js";

export type ReportRenderer = (html: string, options: RenderOptions) => Promise<Buffer>;

export type SessionUpload = { buffer: Buffer; filename: string };

export type ReportHtml = { context: ReportContext; filename: string; html: string };

export type ReportPdf = ReportHtml & { pdf: Buffer };

export type ReportPipeline = {
  generateReportHtml(upload: SessionUpload): Promise<ReportHtml>;
  generateReport(upload: SessionUpload): Promise<ReportPdf>;
};

export function reportFilename(context: Pick<ReportContext, "subjectName" | "sessionName">): string {
  const safe = (s: string) => s.replace(/[\\/:*?"<>|\u0000-\u001f]/g, "_");
  return `${safe(context.subjectName)}_${safe(context.sessionName)}_Report.pdf`;
}

export function createReportPipeline(params: {
  config: AppConfig;
  generator: ReportTextGenerator;
  logger?: Logger;
  render?: ReportRenderer;
}): ReportPipeline {
  const { config, generator } = params;
  const logger = (params.logger ?? silentLogger).child({ component: "reportPipeline" });
  const render = params.render ?? renderReportPdf;
  const strings = getReportStrings(config.report.locale);

  async function generateReportHtml(upload: SessionUpload): Promise<ReportHtml> {
    const startedAt = Date.now();
    const context = parseSessionCsv(upload);
    const { prompt, template } = buildReportPrompt(context, {
      locale: config.report.locale,
      company: config.report.company
    });

    const generatedHtml = await generator.generate({ prompt, template, context, locale: config.report.locale });
    logger.info(
      { kind: context.kind, provider: generator.provider, ms: Date.now() - startedAt },
      "report text generated"
    );

    const chartOptions = { labels: strings.emotionLabels, emptyMessage: strings.noChartData };
    const charts = {
      absolute: renderAbsoluteChart(context.emotions, { ...chartOptions, title: strings.chartTitles.absolute }),
      differential: renderDifferentialChart(context.emotions, context.averageEmotions, {
        ...chartOptions,
        title: strings.chartTitles.differential
      })
    };

    const logo = await loadLogoAsset({ logoPath: config.report.logoPath, logger });
    const assembled = assembleReportDocument({ generatedHtml, charts, logo, kind: context.kind });
    if (!assembled.applied.charts) logger.warn("generated report has no chart insertion point");

    const filename = reportFilename(context);
    await writeDebugHtml(filename, assembled.html);
    return { context, filename, html: assembled.html };
  }

  async function generateReport(upload: SessionUpload): Promise<ReportPdf> {
    const report = await generateReportHtml(upload);
    const startedAt = Date.now();
    const pdf = await render(report.html, {
      baseDir: config.report.assetsDir,
      fontDir: config.report.fontDir,
      logger
    });
    logger.info({ kind: report.context.kind, bytes: pdf.length, ms: Date.now() - startedAt }, "report rendered");
    return { ...report, pdf };
  }

  async function writeDebugHtml(filename: string, html: string): Promise<void> {
    const dir = config.report.debugDir;
    if (!dir) return;
    const file = path.join(dir, filename.replace(/\.pdf$/, ".html"));
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(file, html, "utf8");
      logger.debug({ file }, "debug html written");
    } catch (err: unknown) {
      logger.warn({ file, err }, "could not write debug html");
    }
  }

  return { generateReportHtml, generateReport };
}
