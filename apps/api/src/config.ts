import path from "path";
import { z } from "zod";

import { ConfigError } from "./errors.js";

// Blank env entries (`FOO=` in .env) count as unset.
const optionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().optional()
);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  WEB_ORIGIN: z.string().default("http://localhost:5173"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  REPORT_PROVIDER: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(["openai", "template"]))
    .default("openai"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL_PRIMARY: z.string().default("gpt-4.1"),
  OPENAI_MODEL_FALLBACK: z.string().default("gpt-4.1-mini"),
  REPORT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  REPORT_LOCALE: z.enum(["en", "tr"]).default("en"),
  REPORT_ASSETS_DIR: optionalString,
  REPORT_LOGO_FILE: z.string().default("logo.png"),
  REPORT_FONT_DIR: optionalString,
  REPORT_DEBUG_DIR: optionalString,
  COMPANY_NAME: z.string().default("Session Insights"),
  COMPANY_EMAIL: optionalString,
  COMPANY_ADDRESS: optionalString,
  COMPANY_PHONE: optionalString
});

export type ReportLocale = "en" | "tr";

export type CompanyIdentity = {
  name: string;
  email?: string;
  address?: string;
  phone?: string;
};

export type GeneratorConfig =
  | { provider: "openai"; apiKey: string; modelPrimary: string; modelFallback: string; temperature: number }
  | { provider: "template"; temperature: number };

export type AppConfig = {
  port: number;
  webOrigin: string;
  logLevel: string;
  generator: GeneratorConfig;
  report: {
    locale: ReportLocale;
    assetsDir: string;
    logoPath: string;
    fontDir?: string;
    debugDir?: string;
    company: CompanyIdentity;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid environment configuration", { issues: parsed.error.flatten().fieldErrors });
  }
  const e = parsed.data;

  let generator: GeneratorConfig;
  if (e.REPORT_PROVIDER === "openai") {
    if (!e.OPENAI_API_KEY) throw new ConfigError("OPENAI_API_KEY is required for REPORT_PROVIDER=openai");
    generator = {
      provider: "openai",
      apiKey: e.OPENAI_API_KEY,
      modelPrimary: e.OPENAI_MODEL_PRIMARY,
      modelFallback: e.OPENAI_MODEL_FALLBACK,
      temperature: e.REPORT_TEMPERATURE
    };
  } else {
    generator = { provider: "template", temperature: e.REPORT_TEMPERATURE };
  }

  // Relative directories resolve against the working directory (apps/api when started through npm -w).
  const assetsDir = path.resolve(e.REPORT_ASSETS_DIR ?? "assets");

  return {
    port: e.PORT,
    webOrigin: e.WEB_ORIGIN,
    logLevel: e.LOG_LEVEL,
    generator,
    report: {
      locale: e.REPORT_LOCALE,
      assetsDir,
      logoPath: path.resolve(assetsDir, e.REPORT_LOGO_FILE),
      fontDir: e.REPORT_FONT_DIR ? path.resolve(e.REPORT_FONT_DIR) : undefined,
      debugDir: e.REPORT_DEBUG_DIR ? path.resolve(e.REPORT_DEBUG_DIR) : undefined,
      company: {
        name: e.COMPANY_NAME,
        email: e.COMPANY_EMAIL,
        address: e.COMPANY_ADDRESS,
        phone: e.COMPANY_PHONE
      }
    }
  };
}
