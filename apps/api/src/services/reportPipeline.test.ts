import fs from "fs/promises";
import os from "os";
import path from "path";
import * as cheerio from "cheerio";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { InputFormatError, UpstreamGenerationError } from "../errors.js";
import { PIXEL_PNG_BASE64, sampleContext, sessionCsvBuffer, sessionRow, testConfig } from "../testing/fixtures.js";
import { templateReportGenerator, type ReportTextGenerator } from "./reportGenerator.js";
import { createReportPipeline, reportFilename, type ReportRenderer } from "./reportPipeline.js";

const upload = () => ({ buffer: sessionCsvBuffer(), filename: "session.csv" });

function fakeRenderer() {
  return vi.fn<ReportRenderer>().mockResolvedValue(Buffer.from("%PDF-1.3 fake"));
}

describe("createReportPipeline", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "report-pipeline-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("turns a session row into a named PDF", async () => {
    const render = fakeRenderer();
    const pipeline = createReportPipeline({ config: testConfig(), generator: templateReportGenerator, render });

    const report = await pipeline.generateReport(upload());
    expect(report.filename).toBe("Jane Doe_Backend Interview_Report.pdf");
    expect(report.pdf.toString()).toBe("%PDF-1.3 fake");
    expect(report.context).toEqual(sampleContext);
    expect(render).toHaveBeenCalledWith(report.html, {
      baseDir: "/nonexistent/assets",
      fontDir: undefined,
      logger: expect.anything()
    });
  });

  it("draws the strongest emotion at full height and its lead over the cohort", async () => {
    const pipeline = createReportPipeline({ config: testConfig(), generator: templateReportGenerator });
    const { html } = await pipeline.generateReportHtml(upload());
    const $ = cheerio.load(html);

    const absolute = $.html("#emotion-chart .emotion-chart--absolute svg");
    expect(absolute).toContain('<rect x="40" y="40" width="61.43" height="100" fill="#d4eac8"');

    const differential = $.html("#emotion-chart .emotion-chart--differential svg");
    expect(differential).toContain('<rect x="40" y="40" width="61.43" height="25" fill="#d4eac8"');
    expect(differential).toContain(">+10.0%</text>");
  });

  it("keeps the suitability section for interviews and drops it for customers", async () => {
    const pipeline = createReportPipeline({ config: testConfig(), generator: templateReportGenerator });

    const interview = await pipeline.generateReportHtml(upload());
    expect(cheerio.load(interview.html)("#suitability-section .fit").text()).toBe("Position Fit: 85%");

    const customer = await pipeline.generateReportHtml({
      buffer: sessionCsvBuffer({ ...sessionRow(), kind: 1 }),
      filename: "session.csv"
    });
    expect(customer.html).not.toContain("suitability-section");
    expect(customer.html).not.toContain("{{suitability_section}}");
  });

  it("brands the report when the logo file exists", async () => {
    const logoPath = path.join(dir, "logo.png");
    await fs.writeFile(logoPath, Buffer.from(PIXEL_PNG_BASE64, "base64"));
    const pipeline = createReportPipeline({
      config: testConfig({ assetsDir: dir, logoPath }),
      generator: templateReportGenerator
    });

    const $ = cheerio.load((await pipeline.generateReportHtml(upload())).html);
    expect($("#header-logo img").attr("src")).toBe(`data:image/png;base64,${PIXEL_PNG_BASE64}`);
    expect($("#watermark img")).toHaveLength(1);
  });

  it("writes the assembled html to the debug directory", async () => {
    const debugDir = path.join(dir, "debug");
    const pipeline = createReportPipeline({ config: testConfig({ debugDir }), generator: templateReportGenerator });

    const { html } = await pipeline.generateReportHtml(upload());
    await expect(fs.readFile(path.join(debugDir, "Jane Doe_Backend Interview_Report.html"), "utf8")).resolves.toBe(html);
  });

  it("still answers when the debug directory cannot be written", async () => {
    const blocked = path.join(dir, "not-a-dir");
    await fs.writeFile(blocked, "x");
    const pipeline = createReportPipeline({
      config: testConfig({ debugDir: blocked }),
      generator: templateReportGenerator
    });

    await expect(pipeline.generateReportHtml(upload())).resolves.toHaveProperty("filename");
  });

  it("does not call the generator for an unreadable upload", async () => {
    const generate = vi.fn<ReportTextGenerator["generate"]>();
    const pipeline = createReportPipeline({ config: testConfig(), generator: { provider: "fake", generate } });

    await expect(pipeline.generateReport({ buffer: Buffer.from("a,b"), filename: "session.txt" })).rejects.toBeInstanceOf(
      InputFormatError
    );
    expect(generate).not.toHaveBeenCalled();
  });

  it("fails when the generator answers without markup", async () => {
    const generate = vi.fn<ReportTextGenerator["generate"]>().mockResolvedValue("Sorry, I can't do that.");
    const render = fakeRenderer();
    const pipeline = createReportPipeline({ config: testConfig(), generator: { provider: "fake", generate }, render });

    await expect(pipeline.generateReport(upload())).rejects.toBeInstanceOf(UpstreamGenerationError);
    expect(render).not.toHaveBeenCalled();
  });
});

describe("reportFilename", () => {
  it("replaces path separators", () => {
    expect(reportFilename({ subjectName: "A/B", sessionName: "Round 1: Tech" })).toBe("A_B_Round 1_ Tech_Report.pdf");
  });
});
