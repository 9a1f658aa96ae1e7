import path from "path";
import { describe, expect, it } from "vitest";

import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults for the offline provider", () => {
    const config = loadConfig({ REPORT_PROVIDER: "template" });
    expect(config.port).toBe(8787);
    expect(config.webOrigin).toBe("http://localhost:5173");
    expect(config.logLevel).toBe("info");
    expect(config.generator).toEqual({ provider: "template", temperature: 0.7 });
    expect(config.report).toEqual({
      locale: "en",
      assetsDir: path.resolve("assets"),
      logoPath: path.resolve("assets", "logo.png"),
      fontDir: undefined,
      debugDir: undefined,
      company: { name: "Session Insights", email: undefined, address: undefined, phone: undefined }
    });
  });

  it("reads the OpenAI settings", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", OPENAI_MODEL_FALLBACK: "small-model", REPORT_TEMPERATURE: "0.2" });
    expect(config.generator).toEqual({
      provider: "openai",
      apiKey: "test-secret",
      modelPrimary: "gpt-4.1",
      modelFallback: "small-model",
      temperature: 0.2
    });
  });

  it("requires an API key for the OpenAI provider", () => {
    expect(() => loadConfig({})).toThrow(new ConfigError("OPENAI_API_KEY is required for REPORT_PROVIDER=openai"));
    expect(() => loadConfig({ OPENAI_API_KEY: "  " })).toThrow(ConfigError);
  });

  it("accepts the provider name in any case", () => {
    expect(loadConfig({ REPORT_PROVIDER: "Template" }).generator.provider).toBe("template");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ REPORT_PROVIDER: "template", PORT: "eighty" })).toThrow("Invalid environment configuration");
    expect(() => loadConfig({ REPORT_PROVIDER: "template", REPORT_LOCALE: "de" })).toThrow(ConfigError);
    expect(() => loadConfig({ REPORT_PROVIDER: "local" })).toThrow(ConfigError);
  });

  it("resolves report directories and company details", () => {
    const config = loadConfig({
      REPORT_PROVIDER: "template",
      REPORT_LOCALE: "tr",
      REPORT_ASSETS_DIR: "branding",
      REPORT_LOGO_FILE: "mark.jpg",
      REPORT_DEBUG_DIR: "debug",
      COMPANY_NAME: "Acme Test",
      COMPANY_EMAIL: "hello@example.com"
    });
    expect(config.report.locale).toBe("tr");
    expect(config.report.logoPath).toBe(path.resolve("branding", "mark.jpg"));
    expect(config.report.debugDir).toBe(path.resolve("debug"));
    expect(config.report.company).toEqual({ name: "Acme Test", email: "hello@example.com" });
  });
});
