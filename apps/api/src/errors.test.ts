import { describe, expect, it } from "vitest";

import {
  ConfigError,
  InputFormatError,
  RenderError,
  ReportError,
  UpstreamGenerationError,
  ValidationError,
  describeUpstreamError
} from "./errors.js";

describe("report errors", () => {
  it("carry a code and HTTP status", () => {
    const cases: Array<[ReportError, string, number]> = [
      [new InputFormatError("bad"), "input_format", 400],
      [new ValidationError("bad"), "validation", 400],
      [new RenderError("bad"), "render", 500],
      [new UpstreamGenerationError("bad"), "upstream_generation", 502],
      [new ConfigError("bad"), "config", 500]
    ];
    for (const [err, code, status] of cases) {
      expect(err).toBeInstanceOf(ReportError);
      expect(err.code).toBe(code);
      expect(err.statusCode).toBe(status);
      expect(err.name).toBe(err.constructor.name);
    }
  });

  it("keeps the cause of a render failure", () => {
    const cause = new Error("font missing");
    expect(new RenderError("PDF rendering failed", { cause }).cause).toBe(cause);
  });
});

describe("describeUpstreamError", () => {
  it("reads SDK-style errors", () => {
    const err = Object.assign(new Error("429 You exceeded your current quota"), {
      status: 429,
      request_id: "req_123",
      error: { code: "insufficient_quota", type: "insufficient_quota", message: "You exceeded your current quota" }
    });
    expect(describeUpstreamError(err)).toEqual({
      status: 429,
      code: "insufficient_quota",
      type: "insufficient_quota",
      requestId: "req_123",
      message: "You exceeded your current quota"
    });
  });

  it("falls back for values that are not errors", () => {
    expect(describeUpstreamError("boom")).toEqual({
      status: 0,
      code: "",
      type: "",
      requestId: "",
      message: "Upstream error"
    });
  });
});
