import { once } from "events";
import type { Server } from "http";
import multer from "multer";
import { afterEach, describe, expect, it, vi } from "vitest";

import { createApp } from "../app.js";
import { RenderError, UpstreamGenerationError } from "../errors.js";
import { templateReportGenerator } from "../services/reportGenerator.js";
import { createReportPipeline, type ReportPipeline, type ReportRenderer } from "../services/reportPipeline.js";
import { sessionCsvBuffer, testConfig } from "../testing/fixtures.js";
import { contentDisposition } from "./report.js";

let server: Server | undefined;

async function start(pipeline: ReportPipeline): Promise<string> {
  server = createApp({ config: testConfig(), pipeline }).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  if (!server) return;
  const closing = server;
  server = undefined;
  closing.closeAllConnections();
  await new Promise<void>((resolve, reject) => closing.close((err) => (err ? reject(err) : resolve())));
});

function templatePipeline(): ReportPipeline {
  const render = vi.fn<ReportRenderer>().mockResolvedValue(Buffer.from("%PDF-1.3 fake"));
  return createReportPipeline({ config: testConfig(), generator: templateReportGenerator, render });
}

function failingPipeline(err: unknown): ReportPipeline {
  return {
    generateReportHtml: () => Promise.reject(err),
    generateReport: () => Promise.reject(err)
  };
}

function csvForm(filename = "session.csv", field = "file"): FormData {
  const form = new FormData();
  form.append(field, new Blob([sessionCsvBuffer().toString("utf8")], { type: "text/csv" }), filename);
  return form;
}

async function postReport(base: string, form: FormData, query = ""): Promise<Response> {
  return fetch(`${base}/api/report${query}`, { method: "POST", body: form });
}

describe("GET /healthz", () => {
  it("reports ok", async () => {
    const base = await start(templatePipeline());
    const res = await fetch(`${base}/healthz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });
});

describe("POST /api/report", () => {
  it("returns the PDF as a named attachment", async () => {
    const base = await start(templatePipeline());
    const res = await postReport(base, csvForm());
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/pdf");
    expect(res.headers.get("content-disposition")).toBe(
      "attachment; filename*=UTF-8''Jane%20Doe_Backend%20Interview_Report.pdf"
    );
    expect(Buffer.from(await res.arrayBuffer()).toString()).toBe("%PDF-1.3 fake");
  });

  it("returns the assembled HTML for previews", async () => {
    const base = await start(templatePipeline());
    const res = await postReport(base, csvForm(), "?format=html");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toContain("<h1>Jane Doe - Interview Evaluation Report</h1>");
  });

  it("rejects an unknown format", async () => {
    const base = await start(templatePipeline());
    const res = await postReport(base, csvForm(), "?format=docx");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Invalid query parameters", code: "validation" });
  });

  it("requires a file", async () => {
    const base = await start(templatePipeline());
    const res = await fetch(`${base}/api/report`, { method: "POST" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Missing CSV upload. Send it in the "file" field.', code: "validation" });
  });

  it("rejects a file sent under another field name", async () => {
    const base = await start(templatePipeline());
    const res = await postReport(base, csvForm("session.csv", "upload"));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "validation", details: { reason: "LIMIT_UNEXPECTED_FILE", field: "upload" } });
  });

  it("rejects files that are not CSV", async () => {
    const base = await start(templatePipeline());
    const res = await postReport(base, csvForm("session.txt"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Wrong file format. Upload a .csv file.",
      code: "input_format",
      details: { filename: "session.txt" }
    });
  });

  it("maps oversized uploads to a validation error", async () => {
    const base = await start(failingPipeline(new multer.MulterError("LIMIT_FILE_SIZE", "file")));
    const res = await postReport(base, csvForm());
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "The uploaded file is larger than 5 MB.",
      code: "validation",
      details: { reason: "LIMIT_FILE_SIZE", field: "file" }
    });
  });

  it.each([
    [{ status: 429, code: "insufficient_quota" }, 402],
    [{ status: 429, code: "rate_limit_exceeded" }, 429],
    [{ status: 401 }, 401],
    [{ status: 403 }, 401],
    [{ status: 500 }, 502]
  ])("maps upstream failure %o to HTTP %i", async (upstream, expected) => {
    const base = await start(failingPipeline(new UpstreamGenerationError("Report generation failed", upstream)));
    const res = await postReport(base, csvForm());
    expect(res.status).toBe(expected);
    expect(await res.json()).toMatchObject({ code: "upstream_generation", details: { status: upstream.status } });
  });

  it("reports unparsable generator output as an upstream failure", async () => {
    const base = await start(failingPipeline(new UpstreamGenerationError("Generated report is not HTML markup")));
    const res = await postReport(base, csvForm());
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "Generated report is not HTML markup",
      code: "upstream_generation",
      details: { status: 0, code: "", type: "", requestId: "", message: "Generated report is not HTML markup" }
    });
  });

  it("reports render failures", async () => {
    const base = await start(failingPipeline(new RenderError("PDF rendering failed: boom")));
    const res = await postReport(base, csvForm());
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "PDF rendering failed: boom", code: "render" });
  });

  it("hides unexpected errors", async () => {
    const base = await start(failingPipeline(new TypeError("cannot read properties of undefined")));
    const res = await postReport(base, csvForm());
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Internal error", code: "internal" });
  });
});

describe("contentDisposition", () => {
  it("percent-encodes characters outside the token set", () => {
    expect(contentDisposition("Ayşe's (1)_Report.pdf")).toBe("attachment; filename*=UTF-8''Ay%C5%9Fe%27s%20%281%29_Report.pdf");
  });
});
